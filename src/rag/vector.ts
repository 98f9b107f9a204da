import type { VectorMetric } from '../config/env';

export function cosineDistance(a: number[], b: number[]) {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: number[], b: number[]) {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export function distanceFn(metric: VectorMetric) {
  return metric === 'cosine' ? cosineDistance : euclideanDistance;
}

export function vectorProblem(
  vector: number[],
  dimension: number,
  label: string,
): string | null {
  if (vector.length !== dimension) {
    return `${label} has ${vector.length} dimensions; the chunk store expects ${dimension}`;
  }
  if (!vector.every(Number.isFinite)) {
    return `${label} contains non-finite values`;
  }
  return null;
}

export function toVectorLiteral(arr: number[]) {
  return '[' + arr.map((n) => Number(n).toFixed(8)).join(',') + ']';
}
