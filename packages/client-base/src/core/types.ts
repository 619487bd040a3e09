// =============================================================================
// Core Type Definitions
// =============================================================================
// Pure type definitions with no implementations.

import type { ChannelInterface as Channel, ChannelCredentials } from "@grpc/grpc-js";

/**
 * A failure surfaced by the transport layer.
 *
 * `@grpc/grpc-js` rejects calls with a `ServiceError`, which satisfies this
 * shape. `debugErrorString` is only present on transports that report one.
 */
export interface WireError {
  readonly code: number;
  readonly details?: string;
  readonly debugErrorString?: string;
}

/** Live upstream subscription returned by a streaming stub method */
export type UpstreamCall<T> = AsyncIterable<T> & {
  readonly cancel?: () => void;
};

/** Zero-argument factory, called again on every reconnect */
export type StreamMethod<T> = () => UpstreamCall<T>;

/** Resolved connection parameters of a `grpc://` URI */
export interface GrpcChannelTarget {
  readonly host: string;
  readonly port: number;
  readonly ssl: boolean;
  readonly address: string;
  readonly credentials: ChannelCredentials;
}

/** Minimal surface of a `@grpc/grpc-js` client used by the facade */
export interface GrpcStub {
  close(): void;
  getChannel(): Channel;
}

/** Creates a stub the way a generated client constructor does */
export type CreateStub<Stub extends GrpcStub> = (
  address: string,
  credentials: ChannelCredentials,
) => Stub;

// =============================================================================
// Service Interfaces
// =============================================================================

/** Client-wide configuration */
export interface ClientConfig {
  readonly defaultPort: number;
  readonly defaultSsl: boolean;
  readonly defaultBufferSize: number;
}

/** Logger interface for debugging and monitoring */
export interface ClientLogger {
  readonly debug: (message: string, data?: unknown) => void;
  readonly info: (message: string, data?: unknown) => void;
  readonly warn: (message: string, data?: unknown) => void;
  readonly error: (message: string, data?: unknown) => void;
}
