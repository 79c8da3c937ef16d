import { ItemSelector } from "vectra";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ (${a.length} vs ${b.length})`);
  }
  const normA = ItemSelector.normalize(a);
  const normB = ItemSelector.normalize(b);
  if (normA === 0 || normB === 0) return 0;
  const score = ItemSelector.normalizedCosineSimilarity(a, normA, b, normB);
  return Math.min(1, Math.max(-1, score));
}
