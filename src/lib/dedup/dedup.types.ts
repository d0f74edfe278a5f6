/**
 * Deduplication Types
 */

/**
 * Exact membership set with atomic check-and-set
 */
export interface FingerprintStore {
  readonly name: string;

  /**
   * Add a fingerprint; resolves true only for the caller that added it first
   */
  add(fingerprint: string): Promise<boolean>;
  has(fingerprint: string): Promise<boolean>;
  size(): Promise<number>;
  clear(): Promise<void>;
}

export enum UrlDedupMode {
  EXACT = 'exact',               // exact store
  PROBABILISTIC = 'probabilistic', // Bloom filter only, bounded memory
}

export interface DedupIndexConfig {
  urlMode: UrlDedupMode;
  expectedItems: number;
  falsePositiveRate: number;
}

export interface DedupStats {
  urlsMarked: number;
  urlDuplicates: number;
  contentMarked: number;
  contentDuplicates: number;
  bloomRejections: number;
  urlMode: UrlDedupMode;
  store: string;
}
