// =============================================================================
// Effect Error Classes
// =============================================================================
// Tagged union error types using Effect's Data.TaggedError.
//
// Errors are classified as retryable or not. Retryable errors might succeed if
// the operation is retried, permanent ones won't. When uncertain, an error is
// assumed to be retryable.

import { Data } from "effect";
import type { WireError } from "./types";

// =============================================================================
// Kind Table
// =============================================================================

interface GrpcErrorKindInfo {
  readonly description: string;
  readonly retryable: boolean;
}

/**
 * Fixed description and retryable verdict of every gRPC error kind.
 *
 * @see https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
export const GRPC_ERROR_KINDS = {
  UnrecognizedGrpcStatus: {
    description: "Got an unrecognized status code",
    retryable: true,
  },
  OperationCancelled: {
    description: "The operation was cancelled",
    retryable: true,
  },
  UnknownError: {
    description:
      "There was an error that can't be described using other statuses",
    retryable: true,
  },
  InvalidArgument: {
    description: "The client specified an invalid argument",
    retryable: false,
  },
  OperationTimedOut: {
    description:
      "The time limit was exceeded while waiting for the operation to complete",
    retryable: true,
  },
  EntityNotFound: {
    description: "The requested entity was not found",
    // the entity might be added later
    retryable: true,
  },
  EntityAlreadyExists: {
    description: "The entity that we attempted to create already exists",
    // the entity might be deleted later
    retryable: true,
  },
  PermissionDenied: {
    description:
      "The caller does not have permission to execute the specified operation",
    retryable: true,
  },
  ResourceExhausted: {
    description:
      "Some resource has been exhausted (for example per-user quota, disk space, etc.)",
    retryable: true,
  },
  OperationPreconditionFailed: {
    description:
      "The operation was rejected because the system is not in a required state",
    retryable: true,
  },
  OperationAborted: {
    description: "The operation was aborted",
    retryable: true,
  },
  OperationOutOfRange: {
    description: "The operation was attempted past the valid range",
    retryable: true,
  },
  OperationNotImplemented: {
    description:
      "The operation is not implemented or not supported/enabled in this service",
    retryable: false,
  },
  InternalError: {
    description: "Some invariants expected by the underlying system have been broken",
    retryable: true,
  },
  ServiceUnavailable: {
    description: "The service is currently unavailable",
    retryable: true,
  },
  DataLoss: {
    description: "Unrecoverable data loss or corruption",
    retryable: false,
  },
  OperationUnauthenticated: {
    description:
      "The request does not have valid authentication credentials for the operation",
    retryable: false,
  },
} as const satisfies Record<string, GrpcErrorKindInfo>;

export type GrpcErrorTag = keyof typeof GRPC_ERROR_KINDS;

// =============================================================================
// Error Classes
// =============================================================================

/** Fields shared by every error returned by a gRPC server */
export interface GrpcErrorFields {
  readonly serverUrl: string;
  readonly operation: string;
  readonly message: string;
  readonly status: number;
  readonly statusName: string;
  readonly cause: WireError;
}

const GrpcErrorKind = <Tag extends GrpcErrorTag>(tag: Tag) =>
  class extends Data.TaggedError(tag)<GrpcErrorFields> {
    /** Whether retrying the operation might succeed */
    get retryable(): boolean {
      return GRPC_ERROR_KINDS[tag].retryable;
    }

    /** Fixed human-readable description of the kind */
    get description(): string {
      return GRPC_ERROR_KINDS[tag].description;
    }
  };

/** The client is not connected to the server */
export class ClientNotConnected extends Data.TaggedError("ClientNotConnected")<{
  readonly serverUrl: string;
  readonly operation: string;
  readonly message: string;
}> {
  get retryable(): boolean {
    return true;
  }

  get description(): string {
    return "The client is not connected to the server";
  }
}

/** The gRPC server returned a status code this library doesn't know */
export class UnrecognizedGrpcStatus extends GrpcErrorKind(
  "UnrecognizedGrpcStatus",
) {}

export class OperationCancelled extends GrpcErrorKind("OperationCancelled") {}

export class UnknownError extends GrpcErrorKind("UnknownError") {}

/**
 * The arguments are problematic regardless of the state of the system (e.g. a
 * malformed file name). See {@link OperationPreconditionFailed} for arguments
 * that depend on the system state.
 */
export class InvalidArgument extends GrpcErrorKind("InvalidArgument") {}

/**
 * For operations that change the state of the system, this may be returned even
 * if the operation completed successfully.
 */
export class OperationTimedOut extends GrpcErrorKind("OperationTimedOut") {}

export class EntityNotFound extends GrpcErrorKind("EntityNotFound") {}

export class EntityAlreadyExists extends GrpcErrorKind("EntityAlreadyExists") {}

export class PermissionDenied extends GrpcErrorKind("PermissionDenied") {}

export class ResourceExhausted extends GrpcErrorKind("ResourceExhausted") {}

export class OperationPreconditionFailed extends GrpcErrorKind(
  "OperationPreconditionFailed",
) {}

/** Typically a concurrency issue or a transaction abort */
export class OperationAborted extends GrpcErrorKind("OperationAborted") {}

export class OperationOutOfRange extends GrpcErrorKind("OperationOutOfRange") {}

export class OperationNotImplemented extends GrpcErrorKind(
  "OperationNotImplemented",
) {}

export class InternalError extends GrpcErrorKind("InternalError") {}

/**
 * Most likely transient. Note that it is not always safe to retry
 * non-idempotent operations.
 */
export class ServiceUnavailable extends GrpcErrorKind("ServiceUnavailable") {}

export class DataLoss extends GrpcErrorKind("DataLoss") {}

export class OperationUnauthenticated extends GrpcErrorKind(
  "OperationUnauthenticated",
) {}

/** Union of every error returned by a gRPC server */
export type GrpcError =
  | UnrecognizedGrpcStatus
  | OperationCancelled
  | UnknownError
  | InvalidArgument
  | OperationTimedOut
  | EntityNotFound
  | EntityAlreadyExists
  | PermissionDenied
  | ResourceExhausted
  | OperationPreconditionFailed
  | OperationAborted
  | OperationOutOfRange
  | OperationNotImplemented
  | InternalError
  | ServiceUnavailable
  | DataLoss
  | OperationUnauthenticated;

/** Union of all API client error types */
export type ApiClientError = ClientNotConnected | GrpcError;

// =============================================================================
// Configuration Errors
// =============================================================================

/** A channel URI that can't be turned into connection parameters */
export class InvalidGrpcUriError extends Data.TaggedError("InvalidGrpcUriError")<{
  readonly uri: string;
  readonly message: string;
}> {}
