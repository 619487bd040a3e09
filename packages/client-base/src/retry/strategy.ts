// =============================================================================
// Retry Strategies
// =============================================================================
// Stateful interval calculators used between reconnect attempts.

import { Duration, Option } from "effect";

/** Default retry interval, in milliseconds */
export const DEFAULT_RETRY_INTERVAL = 3000;

/** Default retry jitter, in milliseconds */
export const DEFAULT_RETRY_JITTER = 1000;

/** Default maximum exponential interval, in milliseconds */
export const DEFAULT_MAX_INTERVAL = 60000;

/** Default multiplier for exponential increments */
export const DEFAULT_MULTIPLIER = 2;

// =============================================================================
// Base Strategy
// =============================================================================

/**
 * Computes the time to wait before the next retry.
 *
 * A random jitter in `[0, jitter)` is added on top of the nominal interval of
 * every attempt. Once `limit` attempts have been handed out, the strategy is
 * exhausted until {@link RetryStrategy.reset} is called.
 *
 * Strategies are mutable. Owners that outlive a single run should hand out
 * {@link RetryStrategy.copy | copies} instead of sharing one instance.
 */
export abstract class RetryStrategy implements Iterable<Duration.Duration> {
  protected count = 0;

  protected constructor(
    /** Max number of retries. `undefined` means no limit, `0` means no retry. */
    readonly limit: number | undefined,
    /** Upper bound of the random jitter, in milliseconds */
    readonly jitter: number,
  ) {}

  /** Nominal interval of a 1-indexed attempt, in milliseconds */
  protected abstract nominalInterval(attempt: number): number;

  /** New instance with the same configuration and a reset counter */
  abstract copy(): RetryStrategy;

  /** Number of intervals handed out since the last reset */
  get attempts(): number {
    return this.count;
  }

  /**
   * Time to wait before the next retry, or `none` when the retry limit has
   * been reached.
   */
  nextInterval(): Option.Option<Duration.Duration> {
    if (this.limit !== undefined && this.count >= this.limit) {
      return Option.none();
    }
    this.count += 1;
    return Option.some(
      Duration.millis(
        this.nominalInterval(this.count) + Math.random() * this.jitter,
      ),
    );
  }

  /** Retry progress in the form `(count/limit)` */
  progress(): string {
    return `(${this.count}/${this.limit ?? "∞"})`;
  }

  /** Reset the retry counter */
  reset(): void {
    this.count = 0;
  }

  *[Symbol.iterator](): Iterator<Duration.Duration> {
    while (true) {
      const interval = this.nextInterval();
      if (Option.isNone(interval)) return;
      yield interval.value;
    }
  }
}

// =============================================================================
// Linear Backoff
// =============================================================================

export interface LinearBackoffConfig {
  /** Time to wait before every retry, in milliseconds */
  readonly interval?: number;
  readonly jitter?: number;
  readonly limit?: number;
}

/** Retries at a constant interval */
export class LinearBackoff extends RetryStrategy {
  readonly interval: number;

  constructor(private readonly config: LinearBackoffConfig = {}) {
    super(config.limit, config.jitter ?? DEFAULT_RETRY_JITTER);
    this.interval = config.interval ?? DEFAULT_RETRY_INTERVAL;
  }

  protected nominalInterval(): number {
    return this.interval;
  }

  copy(): LinearBackoff {
    return new LinearBackoff(this.config);
  }
}

// =============================================================================
// Exponential Backoff
// =============================================================================

export interface ExponentialBackoffConfig {
  /** Time to wait before the first retry, in milliseconds */
  readonly initialInterval?: number;
  /** Cap of the nominal interval, in milliseconds */
  readonly maxInterval?: number;
  readonly multiplier?: number;
  readonly jitter?: number;
  readonly limit?: number;
}

/** Retries at `min(initial * multiplier^(n-1), max)` for attempt `n` */
export class ExponentialBackoff extends RetryStrategy {
  readonly initialInterval: number;
  readonly maxInterval: number;
  readonly multiplier: number;

  constructor(private readonly config: ExponentialBackoffConfig = {}) {
    super(config.limit, config.jitter ?? DEFAULT_RETRY_JITTER);
    this.initialInterval = config.initialInterval ?? DEFAULT_RETRY_INTERVAL;
    this.maxInterval = config.maxInterval ?? DEFAULT_MAX_INTERVAL;
    this.multiplier = config.multiplier ?? DEFAULT_MULTIPLIER;
  }

  protected nominalInterval(attempt: number): number {
    return Math.min(
      this.initialInterval * Math.pow(this.multiplier, attempt - 1),
      this.maxInterval,
    );
  }

  copy(): ExponentialBackoff {
    return new ExponentialBackoff(this.config);
  }
}
