// =============================================================================
// Retry Utilities
// =============================================================================

import { Effect, Option } from "effect";
import type { ApiClientError } from "../core/errors";
import { isApiClientError } from "../core/error-utils";
import { LinearBackoff, type RetryStrategy } from "../retry/strategy";
import { runPromiseUnwrapped } from "./run";

// =============================================================================
// Retry Functions
// =============================================================================

/**
 * Re-run an effect while it fails with a retryable {@link ApiClientError}.
 *
 * Intervals come from a private copy of `strategy`, so one strategy can be
 * shared by many calls. A non-retryable error, or an exhausted strategy, fails
 * with the last error.
 */
export const withRetry = <A, E extends ApiClientError, R>(
  effect: Effect.Effect<A, E, R>,
  strategy: RetryStrategy = new LinearBackoff(),
): Effect.Effect<A, E, R> =>
  Effect.suspend(() => {
    const retries = strategy.copy();

    const attempt: Effect.Effect<A, E, R> = effect.pipe(
      Effect.catchAll((error): Effect.Effect<A, E, R> => {
        if (!error.retryable) {
          return Effect.fail(error);
        }
        return Option.match(retries.nextInterval(), {
          onNone: () => Effect.fail(error),
          onSome: (interval) =>
            Effect.sleep(interval).pipe(
              Effect.zipRight(Effect.suspend(() => attempt)),
            ),
        });
      }),
    );

    return attempt;
  });

/**
 * Promise variant of {@link withRetry}.
 * Rejections that are not API client errors are not retried.
 */
export const retryCall = <A>(
  fn: () => Promise<A>,
  strategy?: RetryStrategy,
): Promise<A> =>
  runPromiseUnwrapped(
    withRetry(
      Effect.tryPromise({ try: fn, catch: (error) => error }).pipe(
        Effect.catchAll((error): Effect.Effect<never, ApiClientError> =>
          isApiClientError(error) ? Effect.fail(error) : Effect.die(error),
        ),
      ),
      strategy,
    ),
  );
