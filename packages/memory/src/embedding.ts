import { createHash } from "node:crypto";

export const EMBEDDING_DIM = 64;

/**
 * Hashed bag-of-words vector. The first 64 lowercase whitespace tokens
 * each add `1/(position+1)` to bucket `md5(token) mod 64`; the result is
 * L2-normalised. Deterministic and model-free, so recall is reproducible.
 */
export function embedText(text: string): number[] {
  const vec = new Array<number>(EMBEDDING_DIM).fill(0);
  const words = text.toLowerCase().split(/\s+/).filter(Boolean).slice(0, EMBEDDING_DIM);
  words.forEach((word, i) => {
    vec[bucketOf(word)] += 1 / (i + 1);
  });
  const norm = Math.sqrt(vec.reduce((sum, x) => sum + x * x, 0));
  return norm > 0 ? vec.map((x) => x / norm) : vec;
}

function bucketOf(word: string): number {
  const digest = createHash("md5").update(word, "utf8").digest();
  // 256 is a multiple of 64, so the last byte decides the bucket
  return digest[digest.length - 1] % EMBEDDING_DIM;
}

/** Dot product of two unit vectors, clamped to [0, 1]; 0 on a dimension mismatch. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += (a[i] ?? 0) * (b[i] ?? 0);
  return Math.max(0, Math.min(1, dot));
}
