// =============================================================================
// Error Utilities
// =============================================================================
// Constructors, classification and type guards for API client errors.

import { status } from "@grpc/grpc-js";
import { Effect } from "effect";
import {
  ClientNotConnected,
  DataLoss,
  EntityAlreadyExists,
  EntityNotFound,
  InternalError,
  InvalidArgument,
  OperationAborted,
  OperationCancelled,
  OperationNotImplemented,
  OperationOutOfRange,
  OperationPreconditionFailed,
  OperationTimedOut,
  OperationUnauthenticated,
  PermissionDenied,
  ResourceExhausted,
  ServiceUnavailable,
  UnknownError,
  UnrecognizedGrpcStatus,
  GRPC_ERROR_KINDS,
  type ApiClientError,
  type GrpcError,
  type GrpcErrorFields,
  type GrpcErrorTag,
} from "./errors";
import type { WireError } from "./types";

// =============================================================================
// Classification
// =============================================================================

type GrpcErrorConstructor = new (fields: GrpcErrorFields) => GrpcError;

const GRPC_ERROR_CONSTRUCTORS: {
  readonly [Tag in GrpcErrorTag]: GrpcErrorConstructor;
} = {
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
};

const GRPC_STATUS_TAGS: ReadonlyMap<number, GrpcErrorTag> = new Map<
  number,
  GrpcErrorTag
>([
  [status.CANCELLED, "OperationCancelled"],
  [status.UNKNOWN, "UnknownError"],
  [status.INVALID_ARGUMENT, "InvalidArgument"],
  [status.DEADLINE_EXCEEDED, "OperationTimedOut"],
  [status.NOT_FOUND, "EntityNotFound"],
  [status.ALREADY_EXISTS, "EntityAlreadyExists"],
  [status.PERMISSION_DENIED, "PermissionDenied"],
  [status.RESOURCE_EXHAUSTED, "ResourceExhausted"],
  [status.FAILED_PRECONDITION, "OperationPreconditionFailed"],
  [status.ABORTED, "OperationAborted"],
  [status.OUT_OF_RANGE, "OperationOutOfRange"],
  [status.UNIMPLEMENTED, "OperationNotImplemented"],
  [status.INTERNAL, "InternalError"],
  [status.UNAVAILABLE, "ServiceUnavailable"],
  [status.DATA_LOSS, "DataLoss"],
  [status.UNAUTHENTICATED, "OperationUnauthenticated"],
]);

/** Name of a status code, or the code itself when it has none */
export const getStatusName = (code: number): string => {
  const name: string | undefined = status[code];
  return name ?? String(code);
};

/**
 * Full description of a wire error: the kind description, the status name,
 * then the server message and the debug string when present.
 */
export const describeGrpcError = (
  description: string,
  grpcError: WireError,
): string => {
  const message = grpcError.details ? `: ${grpcError.details}` : "";
  const debug = grpcError.debugErrorString
    ? ` (${grpcError.debugErrorString})`
    : "";
  return `${description} <status=${getStatusName(grpcError.code)}>${message}${debug}`;
};

/** Full description of a wire error under the kind its code maps to */
export const describeWireError = (grpcError: WireError): string =>
  describeGrpcError(
    GRPC_ERROR_KINDS[classifyStatus(grpcError.code)].description,
    grpcError,
  );

const failedCallMessage = (
  operation: string,
  serverUrl: string,
  description: string,
): string => `Failed calling '${operation}' on '${serverUrl}': ${description}`;

/** Kind a status code is classified as */
export const classifyStatus = (code: number): GrpcErrorTag =>
  GRPC_STATUS_TAGS.get(code) ?? "UnrecognizedGrpcStatus";

export interface FromGrpcErrorOptions {
  readonly serverUrl: string;
  readonly operation: string;
  readonly grpcError: WireError;
}

/**
 * Classify a wire error into the matching {@link GrpcError} kind.
 * Unknown status codes become {@link UnrecognizedGrpcStatus}.
 */
export const fromGrpcError = ({
  serverUrl,
  operation,
  grpcError,
}: FromGrpcErrorOptions): GrpcError => {
  const tag = classifyStatus(grpcError.code);
  const Ctor = GRPC_ERROR_CONSTRUCTORS[tag];
  return new Ctor({
    serverUrl,
    operation,
    message: failedCallMessage(
      operation,
      serverUrl,
      describeGrpcError(GRPC_ERROR_KINDS[tag].description, grpcError),
    ),
    status: grpcError.code,
    statusName: getStatusName(grpcError.code),
    cause: grpcError,
  });
};

// =============================================================================
// Error Constructors
// =============================================================================

export const createNotConnectedError = (
  serverUrl: string,
  operation: string,
): ClientNotConnected =>
  new ClientNotConnected({
    serverUrl,
    operation,
    message: failedCallMessage(
      operation,
      serverUrl,
      "The client is not connected to the server",
    ),
  });

// =============================================================================
// Type Guards
// =============================================================================

export const isWireError = (error: unknown): error is WireError => {
  if (typeof error !== "object" || error === null) return false;
  if (!("code" in error) || typeof error.code !== "number") return false;
  if ("details" in error && typeof error.details !== "string") return false;
  return true;
};

const API_CLIENT_ERROR_TAGS: ReadonlySet<string> = new Set([
  "ClientNotConnected",
  ...Object.keys(GRPC_ERROR_KINDS),
]);

export const isApiClientError = (error: unknown): error is ApiClientError =>
  typeof error === "object" &&
  error !== null &&
  "_tag" in error &&
  typeof error._tag === "string" &&
  API_CLIENT_ERROR_TAGS.has(error._tag) &&
  "retryable" in error;

export const isGrpcError = (error: unknown): error is GrpcError =>
  isApiClientError(error) && error._tag !== "ClientNotConnected";

export const isClientNotConnected = (
  error: unknown,
): error is ClientNotConnected => error instanceof ClientNotConnected;

export const isRetryable = (error: ApiClientError): boolean => error.retryable;

// =============================================================================
// Effect Combinators
// =============================================================================

export const failWithNotConnected = (
  serverUrl: string,
  operation: string,
): Effect.Effect<never, ClientNotConnected> =>
  Effect.fail(createNotConnectedError(serverUrl, operation));

export const failWithGrpcError = (
  options: FromGrpcErrorOptions,
): Effect.Effect<never, GrpcError> => Effect.fail(fromGrpcError(options));
