/**
 * Embedding Provider Interface
 * text -> fixed-length vector, deterministic for identical input within a model version
 */

export interface IEmbeddingProvider {
  readonly dimension: number;
  readonly model: string;

  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
