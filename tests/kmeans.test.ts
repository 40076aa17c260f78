import { describe, expect, it } from 'vitest';
import { kmeans, standardize } from '../src/utils/kmeans.js';
import { SeededRNG } from '../src/utils/random.js';

describe('standardize', () => {
  it('centres columns and leaves constant ones at zero', () => {
    expect(standardize([
      [1, 5],
      [3, 5],
    ])).toEqual([
      [-1, 0],
      [1, 0],
    ]);
  });
});

describe('kmeans', () => {
  const points = [[0], [0.1], [10], [10.1]];

  it('splits well separated groups', () => {
    const { labels, inertia } = kmeans(points, { k: 2, seed: 42 });
    expect(labels[0]).toBe(labels[1]);
    expect(labels[2]).toBe(labels[3]);
    expect(labels[0]).not.toBe(labels[2]);
    expect(inertia).toBeCloseTo(0.01, 10);
  });

  it('returns the same labels for the same seed', () => {
    expect(kmeans(points, { k: 3, seed: 5 })).toEqual(kmeans(points, { k: 3, seed: 5 }));
  });

  it('stops seeding when every point coincides with a centre', () => {
    const result = kmeans([[1], [1], [1]], { k: 3, seed: 1 });
    expect(result.labels).toEqual([0, 0, 0]);
    expect(result.centroids).toEqual([[1]]);
    expect(result.inertia).toBe(0);
  });

  it('handles no points', () => {
    expect(kmeans([], { k: 3, seed: 1 }).labels).toEqual([]);
  });
});

describe('SeededRNG', () => {
  it('replays the same sequence for a seed', () => {
    const a = new SeededRNG(42);
    const b = new SeededRNG(42);
    const seqA = [a.next(), a.next(), a.nextInt(10)];
    expect([b.next(), b.next(), b.nextInt(10)]).toEqual(seqA);
    expect(seqA[0]).toBeGreaterThanOrEqual(0);
    expect(seqA[0]).toBeLessThan(1);
  });
});
