export type Point = readonly number[];

export type KMeansOptions = {
  k: number;
  seed: number;
  /** Independent seeded initialisations; the lowest-inertia run wins. */
  restarts?: number;
  maxIterations?: number;
};

export type KMeansResult = {
  centers: number[][];
  labels: number[];
  inertia: number;
};

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function squaredDistance(a: Point, b: Point): number {
  let sum = 0;
  for (let d = 0; d < a.length; d++) {
    const diff = (a[d] ?? 0) - (b[d] ?? 0);
    sum += diff * diff;
  }
  return sum;
}

function nearest(point: Point, centers: Point[]): { index: number; distance: number } {
  let index = 0;
  let distance = Infinity;
  centers.forEach((center, i) => {
    const dist = squaredDistance(point, center);
    if (dist < distance) {
      distance = dist;
      index = i;
    }
  });
  return { index, distance };
}

function pick(points: Point[], rng: () => number): number[] {
  const index = Math.min(points.length - 1, Math.floor(rng() * points.length));
  return [...(points[index] ?? [])];
}

// k-means++ seeding
function initCenters(points: Point[], k: number, rng: () => number): number[][] {
  const centers: number[][] = [pick(points, rng)];
  while (centers.length < k) {
    const weights = points.map((p) => nearest(p, centers).distance);
    const total = weights.reduce((acc, w) => acc + w, 0);
    if (total === 0) {
      centers.push(pick(points, rng));
      continue;
    }
    let target = rng() * total;
    let chosen = points.length - 1;
    for (let i = 0; i < weights.length; i++) {
      target -= weights[i] ?? 0;
      if (target <= 0) {
        chosen = i;
        break;
      }
    }
    centers.push([...(points[chosen] ?? [])]);
  }
  return centers;
}

function lloyd(
  points: Point[],
  initial: number[][],
  maxIterations: number
): KMeansResult {
  const dims = points[0]?.length ?? 0;
  let centers = initial;
  let labels: number[] = [];

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const next = points.map((p) => nearest(p, centers).index);
    const changed = next.some((label, i) => label !== labels[i]);
    labels = next;
    if (!changed) break;

    const sums = centers.map(() => new Array<number>(dims).fill(0));
    const counts = centers.map(() => 0);
    points.forEach((p, i) => {
      const label = labels[i] ?? 0;
      counts[label] = (counts[label] ?? 0) + 1;
      const sum = sums[label];
      if (!sum) return;
      for (let d = 0; d < dims; d++) sum[d] = (sum[d] ?? 0) + (p[d] ?? 0);
    });
    // An empty cluster keeps its previous center.
    centers = centers.map((center, c) => {
      const count = counts[c] ?? 0;
      const sum = sums[c];
      return count > 0 && sum ? sum.map((s) => s / count) : center;
    });
  }

  const inertia = points.reduce(
    (acc, p, i) => acc + squaredDistance(p, centers[labels[i] ?? 0] ?? p),
    0
  );
  return { centers, labels, inertia };
}

/**
 * Seeded k-means. Identical input and options always give identical output;
 * with fewer distinct points than `k` some clusters stay empty.
 */
export function kmeans(points: Point[], options: KMeansOptions): KMeansResult {
  if (points.length === 0) {
    return { centers: [], labels: [], inertia: 0 };
  }
  const rng = createRng(options.seed);
  const restarts = Math.max(1, options.restarts ?? 1);
  const maxIterations = options.maxIterations ?? 100;

  let best: KMeansResult | null = null;
  for (let run = 0; run < restarts; run++) {
    const result = lloyd(points, initCenters(points, options.k, rng), maxIterations);
    if (!best || result.inertia < best.inertia) {
      best = result;
    }
  }
  return best ?? { centers: [], labels: [], inertia: 0 };
}
