/***
 * MapProbe — instrumentation hook for the bucketed maps.
 *
 * A bucket "visit" is the elementary operation of the design: routing a
 * key to its bucket, reading one bucket's size during a naive summation,
 * or walking one bucket during iteration. Counting visits across inputs of
 * increasing size shows whether insertion stays amortized O(1).
 *
 ***/

export interface MapProbe {
  bucket_visited(): void;
  rehashed(from_bucket_count: number, to_bucket_count: number): void;
}

export class OpCounter implements MapProbe {
  bucket_ops = 0;
  rehashes = 0;
  /** Bucket counts after each rehash, oldest first. */
  readonly growth: number[] = [];

  bucket_visited(): void {
    this.bucket_ops++;
  }

  rehashed(_from_bucket_count: number, to_bucket_count: number): void {
    this.rehashes++;
    this.growth.push(to_bucket_count);
  }

  reset(): void {
    this.bucket_ops = 0;
    this.rehashes = 0;
    this.growth.length = 0;
  }
}
