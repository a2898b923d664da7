import type { Embedder } from '../services/vector/VectorStore.interface.js';

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/** Deterministic bag-of-words vectors: texts sharing words have positive cosine similarity. */
export class HashingEmbedder implements Embedder {
  readonly batches: string[][] = [];

  constructor(private readonly dimension: number = 64) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map(text => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of text.toLowerCase().split(/[^a-z0-9]+/)) {
      if (token.length > 0) vector[fnv1a(token) % this.dimension] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map(value => value / norm);
  }
}
