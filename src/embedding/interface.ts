// =============================================================================
// Embedding Provider Interface
// =============================================================================

/**
 * A text-embedding backend (hosted model, local model, or stand-in).
 * The learned path only sees this interface.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /**
   * Generates an embedding for a single text.
   */
  embed(text: string): Promise<Float32Array>;

  /**
   * Generates embeddings for multiple texts (batched).
   */
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}
