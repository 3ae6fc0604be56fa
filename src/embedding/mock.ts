/**
 * Mock Embedding Provider for testing.
 *
 * Stands in for a learned model without API calls. Each word of the text
 * is hashed (djb2) to a dimension and bumped, with a little spill-over onto
 * the two neighbouring dimensions; the result is unit length.
 *
 * Deterministic, but NOT semantic: use a real provider for meaningful
 * similarity between differently-worded schemas.
 */

import type { EmbeddingProvider } from "./interface.js";
import { tokenize } from "./tokenizer.js";
import { embeddingLogger } from "../utils/logger.js";

/**
 * djb2 string hash, kept within 32 bits.
 */
function hashString(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) | 0;
  }
  return Math.abs(hash);
}

function generateMockEmbedding(text: string, dimensions: number): Float32Array {
  const embedding = new Float32Array(dimensions);

  for (const word of tokenize(text)) {
    const dim = hashString(word) % dimensions;
    embedding[dim] += 1.0;

    // Spread to neighbors for smoothing
    if (dim > 0) embedding[dim - 1] += 0.25;
    if (dim < dimensions - 1) embedding[dim + 1] += 0.25;
  }

  let magnitude = 0;
  for (let i = 0; i < dimensions; i++) {
    magnitude += embedding[i] * embedding[i];
  }
  magnitude = Math.sqrt(magnitude);

  if (magnitude > 0) {
    for (let i = 0; i < dimensions; i++) {
      embedding[i] /= magnitude;
    }
  }

  return embedding;
}

export class MockEmbeddingProvider implements EmbeddingProvider {
  readonly name = "mock";
  readonly dimensions: number;

  constructor(dimensions: number = 3072) {
    this.dimensions = dimensions;
    embeddingLogger.debug("Initialized mock embedding provider", {
      dimensions: this.dimensions,
    });
  }

  async embed(text: string): Promise<Float32Array> {
    return generateMockEmbedding(text, this.dimensions);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => generateMockEmbedding(text, this.dimensions));
  }
}

/**
 * Factory function for creating mock embedding provider.
 */
export function createMockProvider(dimensions: number = 3072): EmbeddingProvider {
  return new MockEmbeddingProvider(dimensions);
}
