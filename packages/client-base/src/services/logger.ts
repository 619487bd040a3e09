// =============================================================================
// Client Logger Service
// =============================================================================

import { Effect, Layer } from "effect";
import type { ClientLogger } from "../core/types";

const noopLogger: ClientLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Console logger implementation */
export const consoleLogger: ClientLogger = {
  debug: (msg, data) => console.debug(`[client-base] ${msg}`, data ?? ""),
  info: (msg, data) => console.info(`[client-base] ${msg}`, data ?? ""),
  warn: (msg, data) => console.warn(`[client-base] ${msg}`, data ?? ""),
  error: (msg, data) => console.error(`[client-base] ${msg}`, data ?? ""),
};

/**
 * Log through `logger` without letting a throwing logger fail the caller.
 */
export const safeLog = (
  logger: ClientLogger,
  level: keyof ClientLogger,
  message: string,
  data?: unknown,
): Effect.Effect<void> =>
  Effect.try(() => logger[level](message, data)).pipe(Effect.ignore);

/**
 * Logger service for stream and call events.
 * Uses Effect.Service for idiomatic service definition with default.
 *
 * @example
 * ```ts
 * // Use default (noop logger)
 * Effect.provide(program, ClientLoggerService.Default)
 *
 * // Enable console logging
 * Effect.provide(program, ClientLoggerService.Console)
 *
 * // Custom logger
 * Effect.provide(program, ClientLoggerService.layer(myLogger))
 * ```
 */
export class ClientLoggerService extends Effect.Service<ClientLoggerService>()(
  "ClientLoggerService",
  {
    succeed: noopLogger,
  },
) {
  /** Create a layer with custom logger */
  static layer(logger: ClientLogger) {
    return Layer.succeed(ClientLoggerService, new ClientLoggerService(logger));
  }

  /** Layer with console logging enabled */
  static Console = ClientLoggerService.layer(consoleLogger);
}
