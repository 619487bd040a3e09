// =============================================================================
// @resilient-rpc/client-base - Resilient gRPC Client Base
// =============================================================================
// Building blocks for gRPC API clients: classified errors, retry strategies,
// a reconnecting stream multiplexer and connection management.

// =============================================================================
// Core Types & Errors
// =============================================================================

export type {
  WireError,
  UpstreamCall,
  StreamMethod,
  GrpcChannelTarget,
  GrpcStub,
  CreateStub,
  ClientConfig,
  ClientLogger,
} from "./core";

export {
  // Error classes
  GRPC_ERROR_KINDS,
  type GrpcErrorTag,
  type GrpcErrorFields,
  ClientNotConnected,
  UnrecognizedGrpcStatus,
  OperationCancelled,
  UnknownError,
  InvalidArgument,
  OperationTimedOut,
  EntityNotFound,
  EntityAlreadyExists,
  PermissionDenied,
  ResourceExhausted,
  OperationPreconditionFailed,
  OperationAborted,
  OperationOutOfRange,
  OperationNotImplemented,
  InternalError,
  ServiceUnavailable,
  DataLoss,
  OperationUnauthenticated,
  type GrpcError,
  type ApiClientError,
  InvalidGrpcUriError,
  // Classification
  getStatusName,
  describeGrpcError,
  describeWireError,
  classifyStatus,
  type FromGrpcErrorOptions,
  fromGrpcError,
  createNotConnectedError,
  // Type guards
  isWireError,
  isApiClientError,
  isGrpcError,
  isClientNotConnected,
  isRetryable,
  // Effect combinators
  failWithNotConnected,
  failWithGrpcError,
} from "./core";

// =============================================================================
// Services
// =============================================================================

export {
  ClientConfigService,
  ClientLoggerService,
  consoleLogger,
  safeLog,
} from "./services";

// =============================================================================
// Retry
// =============================================================================

export {
  DEFAULT_RETRY_INTERVAL,
  DEFAULT_RETRY_JITTER,
  DEFAULT_MAX_INTERVAL,
  DEFAULT_MULTIPLIER,
  RetryStrategy,
  type LinearBackoffConfig,
  LinearBackoff,
  type ExponentialBackoffConfig,
  ExponentialBackoff,
} from "./retry";

export { withRetry, retryCall, runPromiseUnwrapped } from "./utils";

// =============================================================================
// Streaming
// =============================================================================

export {
  type MultiplexerState,
  type CloseReason,
  type MultiplexerSnapshot,
  type StreamMultiplexerOptions,
  type ConsumerSlot,
  Consumer,
  StreamMultiplexer,
} from "./streaming";

// =============================================================================
// Channel & Client
// =============================================================================

export {
  parseGrpcUri,
  parseGrpcUriOrThrow,
  type ParseGrpcUriOptions,
} from "./channel";

export { BaseApiClient, type BaseApiClientOptions } from "./client";

// =============================================================================
// Conversion
// =============================================================================

export { type Timestamp, toTimestamp, toDate } from "./conversion";
