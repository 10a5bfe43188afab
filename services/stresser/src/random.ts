const FALLBACK_SEED = 0x9e3779b9;

/**
 * xorshift32 stream owned by exactly one worker. Not suitable for anything
 * security related; it only spreads keys, coin flips and payload bytes.
 */
export class WorkerRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0 || FALLBACK_SEED;
  }

  /** Seeds from the high-resolution clock mixed with the worker identity. */
  static forWorker(workerId: number): WorkerRng {
    const mixed = process.hrtime.bigint() + BigInt(workerId) * 0x9e3779b97f4a7c15n;
    return new WorkerRng(Number(BigInt.asUintN(32, mixed ^ (mixed >> 32n))));
  }

  nextUint32(): number {
    let state = this.state;
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    this.state = state >>> 0;
    return this.state;
  }

  /** Uniform in [0, 1). */
  nextFloat(): number {
    return this.nextUint32() / 0x1_0000_0000;
  }

  /** Uniform in [0, bound). */
  nextInt(bound: number): number {
    return Math.floor(this.nextFloat() * bound);
  }

  coinFlip(): boolean {
    return this.nextFloat() < 0.5;
  }

  fill(target: Uint8Array): void {
    const whole = target.length - (target.length % 4);
    let offset = 0;
    while (offset < whole) {
      const value = this.nextUint32();
      target[offset] = value & 0xff;
      target[offset + 1] = (value >>> 8) & 0xff;
      target[offset + 2] = (value >>> 16) & 0xff;
      target[offset + 3] = value >>> 24;
      offset += 4;
    }
    if (offset < target.length) {
      let value = this.nextUint32();
      while (offset < target.length) {
        target[offset] = value & 0xff;
        value >>>= 8;
        offset += 1;
      }
    }
  }
}
