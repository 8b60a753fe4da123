export class XorShift32 {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
    if (this.state === 0) {
      this.state = 0x6d2b79f5;
    }
  }

  nextUint32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    return this.nextUint32() / 0xffffffff;
  }

  nextInt(minInclusive: number, maxInclusive: number): number {
    if (maxInclusive < minInclusive) {
      throw new Error('invalid range');
    }

    const span = maxInclusive - minInclusive + 1;
    return minInclusive + (this.nextUint32() % span);
  }

  /** Uniform-ish bigint in range, built from as many 32-bit draws as the span needs. */
  nextBigInt(minInclusive: bigint, maxInclusive: bigint): bigint {
    if (maxInclusive < minInclusive) {
      throw new Error('invalid range');
    }

    const span = maxInclusive - minInclusive + 1n;
    let draw = 0n;
    for (let bits = 0n; (1n << bits) < span; bits += 32n) {
      draw = (draw << 32n) | BigInt(this.nextUint32());
    }

    return minInclusive + (draw % span);
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) {
      return undefined;
    }

    return items[this.nextInt(0, items.length - 1)];
  }
}
