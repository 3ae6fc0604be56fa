import OpenAI from "openai";
import type { EmbeddingProvider } from "./interface.js";
import { ConfigurationError, ProviderResponseError } from "../utils/errors.js";
import { embeddingLogger } from "../utils/logger.js";

export interface OpenAIProviderOptions {
  model: string;
  /** Requested from the API; the learned adapter reduces it to the embedding size */
  dimensions: number;
  /** Most schema texts sent in one request */
  batchSize: number;
  apiKey?: string;
}

/**
 * Learned schema embeddings from the OpenAI embeddings endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;

  private client: OpenAI;
  private model: string;
  private batchSize: number;

  constructor(options: OpenAIProviderOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw new ConfigurationError(`OpenAI batch size must be a positive integer, got ${options.batchSize}`);
    }

    this.model = options.model;
    this.dimensions = options.dimensions;
    this.batchSize = options.batchSize;

    this.client = new OpenAI({
      apiKey: options.apiKey || process.env.OPENAI_API_KEY,
    });

    embeddingLogger.info("Initialized OpenAI embedding provider", {
      model: this.model,
      dimensions: this.dimensions,
      batchSize: this.batchSize,
    });
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const embeddings: Float32Array[] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);

      embeddingLogger.debug(`Embedding schemas ${start + 1}-${start + batch.length} of ${texts.length}`, {
        model: this.model,
      });

      embeddings.push(...(await this.request(batch)));
    }

    return embeddings;
  }

  private async request(batch: string[]): Promise<Float32Array[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: batch,
      dimensions: this.dimensions,
    });

    // The API may answer out of order; `index` refers to the input position
    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== batch.length || ordered.some((item, position) => item.index !== position)) {
      throw new ProviderResponseError(
        this.name,
        `expected embeddings for inputs 0-${batch.length - 1}, got [${ordered.map((item) => item.index).join(", ")}]`
      );
    }

    return ordered.map((item) => new Float32Array(item.embedding));
  }
}
