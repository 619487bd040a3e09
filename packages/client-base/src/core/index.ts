// =============================================================================
// Core Module Exports
// =============================================================================

// Types
export type {
  WireError,
  UpstreamCall,
  StreamMethod,
  GrpcChannelTarget,
  GrpcStub,
  CreateStub,
  ClientConfig,
  ClientLogger,
} from "./types";

// Error classes
export {
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
} from "./errors";

// Error utilities
export {
  // Classification
  getStatusName,
  describeGrpcError,
  describeWireError,
  classifyStatus,
  type FromGrpcErrorOptions,
  fromGrpcError,
  // Constructors
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
} from "./error-utils";
