// =============================================================================
// Multiplexer State
// =============================================================================

import { Deferred, Effect, Ref } from "effect";
import type {
  CloseReason,
  ConsumerSlot,
  MultiplexerSnapshot,
  MultiplexerState,
} from "./types";

export const createSnapshotRef = (): Effect.Effect<Ref.Ref<MultiplexerSnapshot>> =>
  Ref.make<MultiplexerSnapshot>({ state: "idle" });

export const createConsumersRef = <T>(): Effect.Effect<
  Ref.Ref<ReadonlySet<ConsumerSlot<T>>>
> => Ref.make<ReadonlySet<ConsumerSlot<T>>>(new Set());

/**
 * Move to a running state. A closed multiplexer stays closed.
 */
export const transitionTo = (
  snapshotRef: Ref.Ref<MultiplexerSnapshot>,
  state: Exclude<MultiplexerState, "closed">,
): Effect.Effect<void> =>
  Ref.update(snapshotRef, (snapshot) =>
    snapshot.state === "closed" ? snapshot : { state },
  );

/**
 * Close the multiplexer once. The first reason recorded wins.
 *
 * The `closed` signal is completed before the consumers are detached so
 * that readers still drain what is buffered.
 */
export const markClosed = <T>(
  snapshotRef: Ref.Ref<MultiplexerSnapshot>,
  consumersRef: Ref.Ref<ReadonlySet<ConsumerSlot<T>>>,
  closed: Deferred.Deferred<CloseReason>,
  reason: CloseReason,
): Effect.Effect<void> =>
  Effect.gen(function* () {
    yield* Ref.update(snapshotRef, (snapshot): MultiplexerSnapshot =>
      snapshot.state === "closed"
        ? snapshot
        : { state: "closed", closeReason: reason },
    );
    yield* Deferred.succeed(closed, reason);
    yield* Ref.set(consumersRef, new Set());
  });

export const attachConsumer = <T>(
  consumersRef: Ref.Ref<ReadonlySet<ConsumerSlot<T>>>,
  slot: ConsumerSlot<T>,
): Effect.Effect<void> =>
  Ref.update(consumersRef, (slots) => new Set(slots).add(slot));

export const detachConsumer = <T>(
  consumersRef: Ref.Ref<ReadonlySet<ConsumerSlot<T>>>,
  slot: ConsumerSlot<T>,
): Effect.Effect<void> =>
  Ref.update(consumersRef, (slots) => {
    const remaining = new Set(slots);
    remaining.delete(slot);
    return remaining;
  });
