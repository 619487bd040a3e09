// =============================================================================
// Client Config Service
// =============================================================================

import { Effect, Layer } from "effect";
import type { ClientConfig } from "../core/types";

const defaultClientConfig: ClientConfig = {
  defaultPort: 9090,
  defaultSsl: true,
  defaultBufferSize: 50,
};

/**
 * Configuration service for channels and streams.
 * Uses Effect.Service for idiomatic service definition with default.
 *
 * @example
 * ```ts
 * // Use default config
 * Effect.provide(program, ClientConfigService.Default)
 *
 * // Custom config
 * Effect.provide(program, ClientConfigService.layer({ defaultPort: 50051 }))
 * ```
 */
export class ClientConfigService extends Effect.Service<ClientConfigService>()(
  "ClientConfigService",
  {
    succeed: defaultClientConfig,
  },
) {
  /** Create a custom config by merging with defaults */
  static config(config: Partial<ClientConfig> = {}): ClientConfig {
    return { ...defaultClientConfig, ...config };
  }

  /** Create a layer with custom config */
  static layer(config: Partial<ClientConfig> = {}) {
    return Layer.succeed(
      ClientConfigService,
      new ClientConfigService(ClientConfigService.config(config)),
    );
  }
}
