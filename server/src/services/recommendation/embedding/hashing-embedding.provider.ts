/**
 * Hashing Embedding Provider
 *
 * Local, dependency-free stand-in for an embedding model (feature hashing).
 * Used in development when no OpenAI key is configured, and in tests.
 * Tokens and their 4-letter stems are hashed into a fixed number of buckets,
 * so "уютное" and "уютный" land close together.
 */

import type { IEmbeddingProvider } from './embedding-provider.interface.js';

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;
const STEM_LENGTH = 4;
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(input: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly model = 'local-hashing-v1';

  constructor(readonly dimension: number = 256) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);

    for (const token of tokenize(text)) {
      this.addFeature(vector, token, 1);
      if (token.length > STEM_LENGTH) {
        this.addFeature(vector, `stem:${token.slice(0, STEM_LENGTH)}`, 0.5);
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const index = hash % this.dimension;
    // Top bit picks the sign so collisions tend to cancel rather than pile up
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[index] += sign * weight;
  }
}
