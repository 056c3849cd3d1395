import type { Embedder } from "../types/index.js";
import { fnv1a } from "../cbr/similarity.js";

export interface HashEmbedderOptions {
  dimensions?: number;
}

const STOP_WORDS = new Set([
  "a", "an", "the", "in", "on", "at", "of", "for", "to", "and", "or", "is",
  "be", "with", "me", "please", "what", "will", "about",
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token));
}

/**
 * 词袋哈希向量：每个词按 FNV 哈希落入一个维度，结果做 L2 归一化。
 * 词序无关，措辞接近的目标得到高余弦相似度。
 */
export class HashEmbedder implements Embedder {
  private readonly dimensions: number;

  constructor(options: HashEmbedderOptions = {}) {
    this.dimensions = options.dimensions ?? 256;
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const bucket = parseInt(fnv1a(token), 16) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}
