import { DimensionMismatchError, EmbeddingValueError, ProviderResponseError } from "../utils/errors.js";
import { embeddingLogger } from "../utils/logger.js";
import type { EmbeddingVector, ReductionMethod } from "../utils/types.js";
import type { EmbeddingProvider } from "./interface.js";
import { normalize } from "./projector.js";

export interface LearnedAdapterOptions {
  /** Length every returned vector has */
  targetSize: number;
  reduction?: ReductionMethod;
}

/**
 * Brings a provider vector to `size` components.
 *
 * - truncate: keeps the leading components, zero-pads a shorter vector
 * - fold: adds component i into slot i mod size (hashing trick)
 * - none: the lengths must already agree
 */
export function reduceDimensions(vector: Float32Array, size: number, method: ReductionMethod): EmbeddingVector {
  if (vector.length === size) {
    return Float32Array.from(vector);
  }

  switch (method) {
    case "none":
      throw new DimensionMismatchError(size, vector.length, "learned embedding");

    case "truncate": {
      const result = new Float32Array(size);
      result.set(vector.subarray(0, Math.min(size, vector.length)));
      return result;
    }

    case "fold": {
      const result = new Float32Array(size);
      for (let i = 0; i < vector.length; i++) {
        result[i % size] += vector[i];
      }
      return result;
    }
  }
}

/**
 * Wraps a learned text-embedding provider so its output has the same shape
 * as the signal generators': fixed length, finite, unit length.
 */
export class LearnedEmbeddingAdapter {
  readonly targetSize: number;
  readonly reduction: ReductionMethod;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: LearnedAdapterOptions
  ) {
    this.targetSize = options.targetSize;
    this.reduction = options.reduction ?? "truncate";
  }

  async embed(schemaText: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedMany([schemaText]);
    return vector;
  }

  /**
   * Embeds several schema texts with one batched provider call.
   * Blank texts map to the zero vector and are not sent.
   */
  async embedMany(schemaTexts: readonly string[]): Promise<EmbeddingVector[]> {
    const results: EmbeddingVector[] = schemaTexts.map(() => new Float32Array(this.targetSize));
    const pending = schemaTexts
      .map((text, position) => ({ text, position }))
      .filter(({ text }) => text.trim().length > 0);

    if (pending.length === 0) {
      return results;
    }

    const raw = await this.provider.embedBatch(pending.map(({ text }) => text));
    if (raw.length !== pending.length) {
      throw new ProviderResponseError(
        this.provider.name,
        `expected ${pending.length} embeddings, got ${raw.length}`
      );
    }

    for (const [i, { position }] of pending.entries()) {
      results[position] = this.shape(raw[i]);
    }
    return results;
  }

  private shape(raw: Float32Array): EmbeddingVector {
    for (let i = 0; i < raw.length; i++) {
      if (!Number.isFinite(raw[i])) {
        throw new EmbeddingValueError(this.provider.name, i);
      }
    }

    if (raw.length !== this.targetSize) {
      embeddingLogger.debug(`Reducing ${this.provider.name} embedding`, {
        from: raw.length,
        to: this.targetSize,
        method: this.reduction,
      });
    }

    return normalize(reduceDimensions(raw, this.targetSize, this.reduction));
  }
}
