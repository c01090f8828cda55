/**
 * Approximate grouping of textually similar items.
 *
 * Each item gets a MinHash signature over its character bigrams; items whose leading
 * signature values agree share a bucket. A bucket also records the union of its members'
 * characters, which lets the filter skip every member of a bucket at once when a query
 * character is missing from that union.
 *
 * Bucketing only affects which items get scored (never excluding a real match) and how
 * equal scores are ordered. It is non-normative: parameters may change freely.
 */

const FNV_OFFSET = 2166136261;
const FNV_PRIME = 16777619;

export interface SimilarityOptions {
  hashCount?: number;
  keyHashes?: number;
}

interface Bucket {
  id: number;
  members: number[];
  chars: Set<string>;
}

export function fnv1a(text: string, seed: number): number {
  let hash = (FNV_OFFSET ^ seed) >>> 0;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function bigrams(chars: readonly string[]): string[] {
  if (chars.length < 2) return [chars.join('')];
  const grams: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) {
    grams.push(`${chars[i] ?? ''}${chars[i + 1] ?? ''}`);
  }
  return grams;
}

export function minHashSignature(chars: readonly string[], hashCount: number): number[] {
  const grams = bigrams(chars);
  const signature: number[] = [];
  for (let seed = 0; seed < hashCount; seed++) {
    let min = Number.POSITIVE_INFINITY;
    for (const gram of grams) {
      const h = fnv1a(gram, seed);
      if (h < min) min = h;
    }
    signature.push(min);
  }
  return signature;
}

export class SimilarityIndex {
  private readonly hashCount: number;
  private readonly keyHashes: number;
  private readonly buckets: Bucket[] = [];
  private readonly bucketsByKey = new Map<string, Bucket>();
  private readonly bucketOfItem: number[] = [];

  constructor(options: SimilarityOptions = {}) {
    this.hashCount = options.hashCount ?? 4;
    this.keyHashes = Math.min(options.keyHashes ?? 2, this.hashCount);
  }

  add(index: number, chars: readonly string[]): void {
    const key = minHashSignature(chars, this.hashCount).slice(0, this.keyHashes).join(':');
    let bucket = this.bucketsByKey.get(key);
    if (!bucket) {
      bucket = { id: this.buckets.length, members: [], chars: new Set() };
      this.buckets.push(bucket);
      this.bucketsByKey.set(key, bucket);
    }
    bucket.members.push(index);
    for (const ch of chars) bucket.chars.add(ch);
    this.bucketOfItem[index] = bucket.id;
  }

  /** Indices of items in buckets that contain every query character. */
  candidates(query: readonly string[]): number[] {
    const needed = new Set(query);
    const result: number[] = [];
    for (const bucket of this.buckets) {
      let possible = true;
      for (const ch of needed) {
        if (!bucket.chars.has(ch)) {
          possible = false;
          break;
        }
      }
      if (!possible) continue;
      for (const member of bucket.members) result.push(member);
    }
    return result;
  }

  bucketOf(index: number): number {
    return this.bucketOfItem[index] ?? -1;
  }
}
