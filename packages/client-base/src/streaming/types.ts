// =============================================================================
// Streaming Types
// =============================================================================

import type { Deferred, Queue } from "effect";
import type { ClientLogger, StreamMethod } from "../core/types";
import type { RetryStrategy } from "../retry/strategy";

/** Lifecycle of a multiplexer */
export type MultiplexerState =
  | "idle"
  | "connecting"
  | "streaming"
  | "backing-off"
  | "closed";

/**
 * Why a multiplexer closed: the retry budget ran out, `stop()` was called, or
 * the loop died on a defect (e.g. a throwing transform).
 */
export type CloseReason = "exhausted" | "stopped" | "failed";

export interface MultiplexerSnapshot {
  readonly state: MultiplexerState;
  readonly closeReason?: CloseReason;
}

export interface StreamMultiplexerOptions<I, O> {
  /** Identifies the stream in the logs */
  readonly streamName: string;
  /** Called every time the connection is lost and we want to retry */
  readonly streamMethod: StreamMethod<I>;
  readonly transform: (message: I) => O;
  /**
   * Retry strategy used when the connection ends. It is copied, never
   * mutated. Defaults to retrying every 3 seconds with a 1 second jitter,
   * indefinitely.
   */
  readonly retryStrategy?: RetryStrategy;
  readonly logger?: ClientLogger;
  /** Buffer size of consumers created without one */
  readonly defaultBufferSize?: number;
}

/** Write side of one attached consumer */
export interface ConsumerSlot<T> {
  readonly queue: Queue.Queue<T>;
  readonly capacity: number;
  readonly detached: Deferred.Deferred<void>;
}
