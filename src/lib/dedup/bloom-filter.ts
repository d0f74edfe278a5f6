/**
 * Bloom Filter
 * Fixed-size probabilistic set over hex fingerprints
 */

export interface BloomFilterOptions {
  expectedItems: number;
  falsePositiveRate: number;
}

export class BloomFilter {
  readonly bitCount: number;
  readonly hashCount: number;
  private readonly bits: Uint8Array;
  private itemCount: number = 0;

  constructor(options: BloomFilterOptions) {
    const n = Math.max(1, options.expectedItems);
    const p = Math.min(Math.max(options.falsePositiveRate, 1e-9), 0.5);

    this.bitCount = Math.ceil((-n * Math.log(p)) / (Math.LN2 * Math.LN2));
    this.hashCount = Math.max(1, Math.round((this.bitCount / n) * Math.LN2));
    this.bits = new Uint8Array(Math.ceil(this.bitCount / 8));
  }

  /**
   * Double hashing (h1 + i*h2) over two 32-bit words of the fingerprint.
   * Fingerprints are hex digests, so their leading bytes are already uniform.
   */
  private positions(fingerprint: string): number[] {
    const h1 = parseInt(fingerprint.slice(0, 8), 16) >>> 0;
    const h2 = (parseInt(fingerprint.slice(8, 16), 16) | 1) >>> 0;
    const positions: number[] = [];
    for (let i = 0; i < this.hashCount; i++) {
      positions.push((h1 + i * h2) % this.bitCount);
    }
    return positions;
  }

  private getBit(position: number): boolean {
    return (this.bits[position >> 3] & (1 << (position & 7))) !== 0;
  }

  private setBit(position: number): void {
    this.bits[position >> 3] |= 1 << (position & 7);
  }

  mightContain(fingerprint: string): boolean {
    return this.positions(fingerprint).every((position) => this.getBit(position));
  }

  add(fingerprint: string): void {
    for (const position of this.positions(fingerprint)) {
      this.setBit(position);
    }
    this.itemCount++;
  }

  /**
   * Add and report whether the fingerprint was (probably) absent before
   */
  testAndAdd(fingerprint: string): boolean {
    const positions = this.positions(fingerprint);
    let absent = false;
    for (const position of positions) {
      if (!this.getBit(position)) {
        absent = true;
        this.setBit(position);
      }
    }
    if (absent) {
      this.itemCount++;
    }
    return absent;
  }

  size(): number {
    return this.itemCount;
  }

  clear(): void {
    this.bits.fill(0);
    this.itemCount = 0;
  }
}
