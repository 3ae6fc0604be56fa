/**
 * Weighted hash projection.
 *
 * Words reach a vector slot through `index mod size`. Distinct words that land
 * on the same slot share it; nothing tries to separate them.
 */

import { DimensionMismatchError } from "../utils/errors.js";
import type { EmbeddingVector, SlidingWindow } from "../utils/types.js";

export function slotFor(index: number, size: number): number {
  return ((index % size) + size) % size;
}

/**
 * Adds `weight` to the slot of `index`. Mutates `vector`.
 */
export function accumulate(vector: EmbeddingVector, index: number, weight: number): void {
  vector[slotFor(index, vector.length)] += weight;
}

/**
 * Like `accumulate`, but also adds `weight * decay^d` to the slots `d`
 * positions either side, for d = 1..radius (wrapping around).
 */
export function spread(vector: EmbeddingVector, index: number, weight: number, window: SlidingWindow): void {
  const slot = slotFor(index, vector.length);
  vector[slot] += weight;

  let share = weight;
  for (let d = 1; d <= window.radius; d++) {
    share *= window.decay;
    if (share === 0) break;
    vector[slotFor(slot - d, vector.length)] += share;
    vector[slotFor(slot + d, vector.length)] += share;
  }
}

export function magnitude(vector: EmbeddingVector): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * Scales `vector` to unit length in place and returns it.
 * A zero vector is returned unchanged.
 */
export function normalize(vector: EmbeddingVector): EmbeddingVector {
  const m = magnitude(vector);
  if (m === 0) {
    return vector;
  }

  for (let i = 0; i < vector.length; i++) {
    vector[i] /= m;
  }
  return vector;
}

/**
 * Cosine similarity in [-1, 1]; 0 when either side is the zero vector.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, "cosine similarity");
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}
