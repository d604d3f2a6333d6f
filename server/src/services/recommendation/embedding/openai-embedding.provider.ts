/**
 * OpenAI Embedding Provider
 * Any OpenAI-compatible embeddings endpoint (configurable base URL and model)
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './embedding-provider.interface.js';

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  dimension: number;
  baseUrl?: string | null;
  timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingOptions, client?: OpenAI) {
    this.model = options.model;
    this.dimension = options.dimension;
    this.client = client ?? new OpenAI({
      apiKey: options.apiKey,
      ...(options.baseUrl && { baseURL: options.baseUrl }),
      timeout: options.timeoutMs ?? 10_000,
      maxRetries: 1
    });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input: text, dimensions: this.dimension },
      { signal }
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`Embedding response for model ${this.model} contained no vectors`);
    }
    if (embedding.length !== this.dimension) {
      throw new Error(`Embedding dimension mismatch: expected ${this.dimension}, got ${embedding.length}`);
    }
    return embedding;
  }
}
