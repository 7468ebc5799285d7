/**
 * embeddings.ts - Voyage AI vectors for health documents and questions
 *
 * The same embedder serves ingestion and retrieval, so a document and a
 * question about it land in the same space. Large ingests are split into
 * requests of at most `batchSize` texts.
 */

import { VoyageAIClient } from "voyageai";
import type { EmbeddingFunction } from "./types";

export const DEFAULT_EMBEDDING_MODEL = "voyage-4";

/** Voyage accepts up to 128 inputs per embed request */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 128;

export interface VoyageEmbeddingOptions {
  apiKey: string;
  model?: string;
  batchSize?: number;
}

export class VoyageEmbedding implements EmbeddingFunction {
  readonly model: string;
  private readonly client: VoyageAIClient;
  private readonly batchSize: number;

  constructor(options: VoyageEmbeddingOptions) {
    if (options.apiKey.trim() === "") {
      throw new Error("Voyage AI API key is required (VOYAGE_API_KEY)");
    }
    this.client = new VoyageAIClient({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.embedBatch(batch)));
    }
    return vectors;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const response = await this.client.embed({ input: batch, model: this.model });
    const items = response.data;
    if (!items || items.length !== batch.length) {
      throw new Error(
        `Voyage AI (${this.model}) returned ${items?.length ?? 0} embeddings for ${batch.length} texts`
      );
    }

    // items carry their input position; order by it
    const ordered = [...items].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((item, position) => {
      if (!item.embedding) {
        throw new Error(`Voyage AI (${this.model}) returned no vector for text ${position}`);
      }
      return item.embedding;
    });
  }
}
