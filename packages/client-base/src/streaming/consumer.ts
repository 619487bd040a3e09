// =============================================================================
// Stream Consumer
// =============================================================================
// Read side of a bounded per-consumer buffer.

import { Deferred, Effect, Option, Queue, type Ref } from "effect";
import { detachConsumer } from "./state";
import type { CloseReason, ConsumerSlot } from "./types";

const doneResult: IteratorReturnResult<undefined> = {
  done: true,
  value: undefined,
};

const valueResult = <T>(value: T): IteratorYieldResult<T> => ({
  done: false,
  value,
});

/**
 * Lazy, non-restartable sequence of the messages published after the consumer
 * was attached. The sequence ends, without an error, once the multiplexer
 * closes and the buffer has been drained, or once the consumer is closed.
 */
export class Consumer<T> implements AsyncIterableIterator<T> {
  constructor(
    private readonly slot: ConsumerSlot<T>,
    private readonly closed: Deferred.Deferred<CloseReason>,
    private readonly consumers: Ref.Ref<ReadonlySet<ConsumerSlot<T>>>,
  ) {}

  private readonly take: Effect.Effect<IteratorResult<T, undefined>> =
    Effect.gen(this, function* () {
      const { queue, detached } = this.slot;

      if (yield* Deferred.isDone(detached)) {
        return doneResult;
      }

      const buffered = yield* Queue.poll(queue);
      if (Option.isSome(buffered)) {
        return valueResult(buffered.value);
      }

      // Messages can still be buffered when the multiplexer closes
      const next = yield* Queue.take(queue).pipe(
        Effect.map(Option.some),
        Effect.race(
          Deferred.await(this.closed).pipe(Effect.zipRight(Queue.poll(queue))),
        ),
        Effect.race(Deferred.await(detached).pipe(Effect.as(Option.none<T>()))),
      );

      return Option.match(next, {
        onNone: (): IteratorResult<T, undefined> => doneResult,
        onSome: (value): IteratorResult<T, undefined> => valueResult(value),
      });
    });

  /**
   * Number of messages waiting in the buffer. The queue size also counts
   * blocked offers and waiting readers, so it is clamped to the buffer.
   */
  get pending(): number {
    const size = Effect.runSync(Queue.size(this.slot.queue));
    return Math.min(Math.max(size, 0), this.slot.capacity);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    return Effect.runPromise(this.take);
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    await this.close();
    return doneResult;
  }

  /**
   * Detach from the multiplexer. Buffered messages are dropped and the
   * consumer no longer holds back publication.
   */
  close(): Promise<void> {
    const slot = this.slot;
    return Effect.runPromise(
      Effect.gen(this, function* () {
        yield* Deferred.succeed(slot.detached, undefined);
        yield* detachConsumer(this.consumers, slot);
      }),
    );
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
