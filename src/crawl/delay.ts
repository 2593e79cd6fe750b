import { sleep as timerSleep, type RandomSource, type SleepFn } from '../shared/utils.js';

export interface DelayPolicyOptions {
  minMs: number;
  maxMs: number;
  random?: RandomSource;
  sleep?: SleepFn;
}

/**
 * Randomized pacing between outbound requests. Durations are drawn uniformly
 * from [minMs, maxMs]; a seeded random source makes the sequence reproducible.
 */
export class DelayPolicy {
  readonly minMs: number;
  readonly maxMs: number;
  private readonly random: RandomSource;
  private readonly sleepFn: SleepFn;

  constructor(options: DelayPolicyOptions) {
    if (options.minMs < 0 || options.maxMs < options.minMs) {
      throw new RangeError(`Invalid delay range [${options.minMs}, ${options.maxMs}]`);
    }
    this.minMs = options.minMs;
    this.maxMs = options.maxMs;
    this.random = options.random ?? Math.random;
    this.sleepFn = options.sleep ?? timerSleep;
  }

  static fromSeconds(
    minSeconds: number,
    maxSeconds: number,
    extra: Omit<DelayPolicyOptions, 'minMs' | 'maxMs'> = {},
  ): DelayPolicy {
    return new DelayPolicy({ minMs: minSeconds * 1000, maxMs: maxSeconds * 1000, ...extra });
  }

  nextDelay(): number {
    return this.minMs + this.random() * (this.maxMs - this.minMs);
  }

  /** Sleep for one sampled interval and return its length in milliseconds. */
  async wait(signal?: AbortSignal): Promise<number> {
    const ms = this.nextDelay();
    await this.sleepFn(ms, signal);
    return ms;
  }
}
