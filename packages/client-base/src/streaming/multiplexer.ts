// =============================================================================
// Stream Multiplexer
// =============================================================================
// Keeps one server stream alive and fans its messages out to any number of
// consumers, each with its own bounded buffer.

import {
  Cause,
  Deferred,
  Duration,
  Effect,
  Exit,
  Fiber,
  Option,
  Queue,
  Ref,
} from "effect";
import { describeWireError, isWireError } from "../core/error-utils";
import type { ClientLogger, UpstreamCall } from "../core/types";
import { LinearBackoff, type RetryStrategy } from "../retry/strategy";
import { ClientConfigService } from "../services/config";
import { ClientLoggerService, safeLog } from "../services/logger";
import { Consumer } from "./consumer";
import {
  attachConsumer,
  createConsumersRef,
  createSnapshotRef,
  markClosed,
  transitionTo,
} from "./state";
import type {
  CloseReason,
  ConsumerSlot,
  MultiplexerSnapshot,
  MultiplexerState,
  StreamMultiplexerOptions,
} from "./types";

/** Text of the error that ended a connection, as it appears in the logs */
const describeEnding = (error: unknown): string => {
  if (isWireError(error)) return describeWireError(error);
  if (error instanceof Error) return error.message;
  return String(error);
};

interface Upstream<T> {
  readonly call: UpstreamCall<T>;
  readonly iterator: AsyncIterator<T>;
}

/**
 * Cancel the upstream call and let its iterator run its own cleanup. The
 * iterator is not awaited: a read that never settles must not block shutdown.
 */
const releaseUpstream = <T>(
  { call, iterator }: Upstream<T>,
  logger: ClientLogger,
  streamName: string,
): Effect.Effect<void> => {
  const logCleanupFailure = (error: unknown) =>
    safeLog(logger, "debug", `${streamName}: upstream cleanup failed`, error);

  return Effect.try(() => {
    call.cancel?.();
    const closing = iterator.return?.();
    void closing?.then(undefined, (error: unknown) =>
      Effect.runSync(logCleanupFailure(error)),
    );
  }).pipe(Effect.catchAll(logCleanupFailure));
};

/**
 * Broadcasts a server stream to multiple consumers, reconnecting with the
 * given retry strategy whenever the connection ends.
 *
 * The stream starts as soon as the multiplexer is created. Messages are only
 * delivered to consumers attached at the time they arrive, and publication
 * waits until every attached consumer has room for the message.
 *
 * @example
 * ```ts
 * const multiplexer = new StreamMultiplexer({
 *   streamName: "telemetry",
 *   streamMethod: () => stub.streamTelemetry(request),
 *   transform: (message) => message.value,
 *   retryStrategy: new ExponentialBackoff({ limit: 5 }),
 * });
 *
 * for await (const value of multiplexer.newConsumer()) {
 *   console.log(value);
 * }
 * ```
 */
export class StreamMultiplexer<I, O> {
  readonly streamName: string;

  private readonly snapshot: Ref.Ref<MultiplexerSnapshot>;
  private readonly consumers: Ref.Ref<ReadonlySet<ConsumerSlot<O>>>;
  private readonly closed: Deferred.Deferred<CloseReason>;
  private readonly retryStrategy: RetryStrategy;
  private readonly defaultBufferSize: number;
  private readonly fiber: Fiber.RuntimeFiber<void>;

  constructor(private readonly options: StreamMultiplexerOptions<I, O>) {
    this.streamName = options.streamName;
    this.retryStrategy = (options.retryStrategy ?? new LinearBackoff()).copy();
    this.defaultBufferSize =
      options.defaultBufferSize ??
      ClientConfigService.config().defaultBufferSize;

    this.snapshot = Effect.runSync(createSnapshotRef());
    this.consumers = Effect.runSync(createConsumersRef<O>());
    this.closed = Effect.runSync(Deferred.make<CloseReason>());

    const loggerLayer = options.logger
      ? ClientLoggerService.layer(options.logger)
      : ClientLoggerService.Default;

    this.fiber = Effect.runFork(
      this.run().pipe(
        Effect.onExit((exit) => this.finish(exit)),
        Effect.provide(loggerLayer),
      ),
    );
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  get state(): MultiplexerState {
    return Effect.runSync(Ref.get(this.snapshot)).state;
  }

  /** Why the multiplexer closed, `undefined` while it is running */
  get closeReason(): CloseReason | undefined {
    return Effect.runSync(Ref.get(this.snapshot)).closeReason;
  }

  /**
   * Attach a consumer that receives every message published from now on.
   *
   * A consumer attached after the multiplexer closed is already ended.
   */
  newConsumer(bufferSize: number = this.defaultBufferSize): Consumer<O> {
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new RangeError(
        `bufferSize must be a positive integer, got ${bufferSize}`,
      );
    }

    const slot = Effect.runSync(
      Effect.gen(this, function* () {
        const slot: ConsumerSlot<O> = {
          queue: yield* Queue.bounded<O>(bufferSize),
          capacity: bufferSize,
          detached: yield* Deferred.make<void>(),
        };
        if (!(yield* Deferred.isDone(this.closed))) {
          yield* attachConsumer(this.consumers, slot);
        }
        return slot;
      }),
    );

    return new Consumer(slot, this.closed, this.consumers);
  }

  /** Resolves with the close reason once the multiplexer has closed */
  done(): Promise<CloseReason> {
    return Effect.runPromise(Deferred.await(this.closed));
  }

  /**
   * Stop streaming and end every consumer. Resolves once the background loop
   * has terminated. Calling it again is a no-op.
   */
  async stop(): Promise<void> {
    await Effect.runPromise(Fiber.interrupt(this.fiber));
    // The loop can be interrupted before its exit handler was installed
    Effect.runSync(
      markClosed(this.snapshot, this.consumers, this.closed, "stopped"),
    );
  }

  // ===========================================================================
  // Background Loop
  // ===========================================================================

  private run(): Effect.Effect<void, never, ClientLoggerService> {
    const { streamName } = this.options;
    const strategy = this.retryStrategy;

    return Effect.gen(this, function* () {
      const logger = yield* ClientLoggerService;

      while (true) {
        yield* transitionTo(this.snapshot, "connecting");
        yield* safeLog(logger, "info", `${streamName}: starting to stream`);

        const ending = yield* this.streamOnce(logger).pipe(
          Effect.as(Option.none<unknown>()),
          Effect.catchAll((error) => Effect.succeed(Option.some(error))),
        );

        yield* transitionTo(this.snapshot, "backing-off");
        const interval = strategy.nextInterval();

        if (Option.isNone(interval)) {
          const cause = Option.match(ending, {
            onNone: () => "Stream exhausted.",
            onSome: (error) => `Error: ${describeEnding(error)}.`,
          });
          yield* safeLog(
            logger,
            "error",
            `${streamName}: connection ended, retry limit exceeded ${strategy.progress()}, giving up. ${cause}`,
          );
          return;
        }

        const seconds = (Duration.toMillis(interval.value) / 1000).toFixed(3);
        const cause = Option.match(ending, {
          onNone: () => "",
          onSome: (error) => ` Error: ${describeEnding(error)}.`,
        });
        yield* safeLog(
          logger,
          "warn",
          `${streamName}: connection ended, retrying ${strategy.progress()} in ${seconds} seconds.${cause}`,
        );

        yield* Effect.sleep(interval.value);
      }
    });
  }

  /**
   * One connection: open the upstream call and publish until it ends. Fails
   * with whatever the upstream failed with. A throwing transform is a defect.
   */
  private streamOnce(logger: ClientLogger): Effect.Effect<void, unknown> {
    const { streamName, streamMethod, transform } = this.options;

    return Effect.acquireUseRelease(
      Effect.try({
        try: (): Upstream<I> => {
          const call = streamMethod();
          return { call, iterator: call[Symbol.asyncIterator]() };
        },
        catch: (error) => error,
      }),
      ({ iterator }) =>
        Effect.gen(this, function* () {
          yield* transitionTo(this.snapshot, "streaming");

          while (true) {
            const result = yield* Effect.tryPromise({
              try: () => iterator.next(),
              catch: (error) => error,
            });
            if (result.done) return;

            const message = yield* Effect.sync(() => transform(result.value));
            yield* this.publish(message);
          }
        }),
      (upstream) => releaseUpstream(upstream, logger, streamName),
    );
  }

  /** Offer a message to every attached consumer and wait until all took it */
  private publish(message: O): Effect.Effect<void> {
    return Ref.get(this.consumers).pipe(
      Effect.flatMap((slots) =>
        Effect.forEach(
          slots,
          (slot) =>
            Queue.offer(slot.queue, message).pipe(
              Effect.race(Deferred.await(slot.detached)),
            ),
          { concurrency: "unbounded", discard: true },
        ),
      ),
    );
  }

  private finish(
    exit: Exit.Exit<void>,
  ): Effect.Effect<void, never, ClientLoggerService> {
    const reason: CloseReason = Exit.isSuccess(exit)
      ? "exhausted"
      : Cause.isInterruptedOnly(exit.cause)
        ? "stopped"
        : "failed";

    const report = Effect.gen(this, function* () {
      if (Exit.isSuccess(exit) || reason !== "failed") return;
      const logger = yield* ClientLoggerService;
      yield* safeLog(
        logger,
        "error",
        `${this.streamName}: stream loop failed, closing consumers`,
        Cause.pretty(exit.cause),
      );
    });

    return report.pipe(
      Effect.ensuring(
        markClosed(this.snapshot, this.consumers, this.closed, reason),
      ),
    );
  }
}
