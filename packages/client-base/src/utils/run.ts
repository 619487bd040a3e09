// =============================================================================
// Promise Bridge
// =============================================================================
// Runs effects for callers that live in the Promise world.

import { Cause, Effect, Exit } from "effect";

/**
 * Run an effect and reject with the original failure (or defect) instead of
 * the fiber failure wrapper `Effect.runPromise` produces.
 */
export const runPromiseUnwrapped = async <A, E>(
  effect: Effect.Effect<A, E>,
): Promise<A> => {
  const exit = await Effect.runPromiseExit(effect);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
};
