import { bytesToMb, estimateCost, maxDepthForColumns } from '../src/application/services/CostEstimator.js';
import { ValidationError } from '../src/core/errors.js';

describe('CostEstimator', () => {
  describe('estimateCost', () => {
    test('charges size times depth for private runs', () => {
      expect(estimateCost({ fileSizeMb: 2.0, depth: 3, visibility: 'private' }).credits).toBe(6);
    });

    test('charges at least one credit for a small private run', () => {
      expect(estimateCost({ fileSizeMb: 0.1, depth: 1, visibility: 'private' }).credits).toBe(1);
    });

    test('rounds partial credits up', () => {
      expect(estimateCost({ fileSizeMb: 2.1, depth: 2, visibility: 'private' }).credits).toBe(5);
    });

    test('public runs are free', () => {
      expect(estimateCost({ fileSizeMb: 500, depth: 1, visibility: 'public' }).credits).toBe(0);
      expect(estimateCost({ fileSizeMb: 0.01, depth: 4, visibility: 'public' }).credits).toBe(0);
    });

    test('echoes its input', () => {
      expect(estimateCost({ fileSizeMb: 1.5, depth: 2, visibility: 'private' })).toEqual({
        fileSizeMb: 1.5,
        depth: 2,
        visibility: 'private',
        credits: 3,
      });
    });

    test('is non-decreasing in size and depth', () => {
      const sizes = [0.05, 0.5, 1, 1.01, 3.7, 10, 250];
      const depths = [1, 2, 3, 5, 8];

      for (const depth of depths) {
        let previous = 0;
        for (const fileSizeMb of sizes) {
          const { credits } = estimateCost({ fileSizeMb, depth, visibility: 'private' });
          expect(credits).toBeGreaterThanOrEqual(Math.max(1, previous));
          previous = credits;
        }
      }

      for (const fileSizeMb of sizes) {
        let previous = 0;
        for (const depth of depths) {
          const { credits } = estimateCost({ fileSizeMb, depth, visibility: 'private' });
          expect(credits).toBeGreaterThanOrEqual(Math.max(1, previous));
          previous = credits;
        }
      }
    });

    test.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects file size %p', (fileSizeMb) => {
      expect(() => estimateCost({ fileSizeMb, depth: 1, visibility: 'private' })).toThrow(ValidationError);
      expect(() => estimateCost({ fileSizeMb, depth: 1, visibility: 'private' })).toThrow(
        expect.objectContaining({ constraint: 'file_size_mb > 0' })
      );
    });

    test.each([0, -2, 1.5])('rejects depth %p instead of clamping it', (depth) => {
      expect(() => estimateCost({ fileSizeMb: 1, depth, visibility: 'private' })).toThrow(
        expect.objectContaining({ constraint: 'depth >= 1' })
      );
    });
  });

  test('maxDepthForColumns is num_columns - 2', () => {
    expect(maxDepthForColumns(3)).toBe(1);
    expect(maxDepthForColumns(10)).toBe(8);
  });

  test('bytesToMb uses binary megabytes', () => {
    expect(bytesToMb(1024 * 1024)).toBe(1);
    expect(bytesToMb(512 * 1024)).toBe(0.5);
  });
});
