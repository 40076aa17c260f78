import { SeededRNG } from './random.js';

export type Vector = readonly number[];

export interface KMeansOptions {
  k: number;
  seed: number;
  restarts?: number; // independent k-means++ starts; the lowest inertia wins
  maxIterations?: number;
  tolerance?: number; // squared centroid shift that counts as converged
}

export interface KMeansResult {
  labels: number[];
  centroids: number[][];
  inertia: number;
  iterations: number;
}

function squaredDistance(a: Vector, b: Vector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

/**
 * Zero mean, unit variance per column (population variance). A column with
 * no variance is centred and left at 0.
 */
export function standardize(rows: readonly Vector[]): number[][] {
  if (!rows.length) return [];
  const width = rows[0].length;
  const means: number[] = [];
  const scales: number[] = [];

  for (let j = 0; j < width; j++) {
    let sum = 0;
    for (const row of rows) sum += row[j];
    const m = sum / rows.length;
    let sq = 0;
    for (const row of rows) sq += (row[j] - m) * (row[j] - m);
    const std = Math.sqrt(sq / rows.length);
    means.push(m);
    scales.push(std > 0 ? std : 1);
  }

  return rows.map((row) => row.map((v, j) => (v - means[j]) / scales[j]));
}

function nearest(point: Vector, centroids: readonly Vector[]): { index: number; distance: number } {
  let index = 0;
  let distance = Infinity;
  centroids.forEach((c, i) => {
    const d = squaredDistance(point, c);
    if (d < distance) {
      distance = d;
      index = i;
    }
  });
  return { index, distance };
}

/**
 * k-means++ seeding: each next centre is drawn with probability proportional
 * to its squared distance from the centres already chosen. Stops early when
 * every point coincides with a centre.
 */
function seedCentroids(points: readonly Vector[], k: number, rng: SeededRNG): number[][] {
  const centroids: number[][] = [[...points[rng.nextInt(points.length)]]];

  while (centroids.length < k) {
    const weights = points.map((p) => nearest(p, centroids).distance);
    const total = weights.reduce((a, b) => a + b, 0);
    if (total <= 0) break;

    const target = rng.next() * total;
    let cumulative = 0;
    let pick = weights.findIndex((w) => w > 0);
    for (let i = 0; i < weights.length; i++) {
      cumulative += weights[i];
      if (cumulative > target) {
        pick = i;
        break;
      }
    }
    centroids.push([...points[pick]]);
  }
  return centroids;
}

function lloyd(
  points: readonly Vector[],
  initial: number[][],
  maxIterations: number,
  tolerance: number,
): KMeansResult {
  let centroids = initial;
  let labels = points.map((p) => nearest(p, centroids).index);
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;
    const next = centroids.map((c, ci) => {
      const members = points.filter((_, pi) => labels[pi] === ci);
      // an emptied cluster keeps its previous centre
      if (!members.length) return c;
      return c.map((_, j) => members.reduce((a, m) => a + m[j], 0) / members.length);
    });

    const shift = Math.max(...next.map((c, i) => squaredDistance(c, centroids[i])));
    centroids = next;
    labels = points.map((p) => nearest(p, centroids).index);
    if (shift <= tolerance) break;
  }

  const inertia = points.reduce((a, p, i) => a + squaredDistance(p, centroids[labels[i]]), 0);
  return { labels, centroids, inertia, iterations };
}

/**
 * Deterministic k-means: the same points, k and seed always give the same labels.
 */
export function kmeans(points: readonly Vector[], opts: KMeansOptions): KMeansResult {
  if (!points.length) return { labels: [], centroids: [], inertia: 0, iterations: 0 };

  const k = Math.max(1, Math.min(opts.k, points.length));
  const restarts = Math.max(1, opts.restarts ?? 10);
  const maxIterations = opts.maxIterations ?? 300;
  const tolerance = opts.tolerance ?? 1e-8;
  const rng = new SeededRNG(opts.seed);

  let best: KMeansResult | undefined;
  for (let run = 0; run < restarts; run++) {
    const result = lloyd(points, seedCentroids(points, k, rng), maxIterations, tolerance);
    if (!best || result.inertia < best.inertia) best = result;
  }
  return best ?? { labels: [], centroids: [], inertia: 0, iterations: 0 };
}
