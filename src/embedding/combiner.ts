/**
 * Linear blend of generator outputs.
 */

import { ConfigurationError, DimensionMismatchError } from "../utils/errors.js";
import type { EmbeddingVector, WeightedVector } from "../utils/types.js";
import { normalize } from "./projector.js";

/**
 * result[i] = sum over g of weight_g * vector_g[i], then normalized.
 *
 * Every vector must share one length, including zero-weight ones.
 * If all weights are 0 the result is the zero vector.
 */
export function combine(entries: readonly WeightedVector[]): EmbeddingVector {
  if (entries.length === 0) {
    throw new ConfigurationError("combine() needs at least one vector");
  }

  const size = entries[0].vector.length;
  for (const { vector, weight } of entries) {
    if (vector.length !== size) {
      throw new DimensionMismatchError(size, vector.length, "combine");
    }
    if (!Number.isFinite(weight)) {
      throw new ConfigurationError(`Generator weight must be finite, got ${weight}`);
    }
  }

  const result = new Float32Array(size);
  for (const { vector, weight } of entries) {
    if (weight === 0) continue;
    for (let i = 0; i < size; i++) {
      result[i] += weight * vector[i];
    }
  }

  return normalize(result);
}

/**
 * Combines named vectors. Names absent from `weights` count as weight 0.
 */
export function combineNamed(
  vectors: Partial<Record<string, EmbeddingVector>>,
  weights: Partial<Record<string, number>>
): EmbeddingVector {
  const entries: WeightedVector[] = [];

  for (const [name, vector] of Object.entries<EmbeddingVector | undefined>(vectors)) {
    if (!vector) continue;
    const weight = weights[name] ?? 0;
    entries.push({ vector, weight });
  }

  return combine(entries);
}
