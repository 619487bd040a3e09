// =============================================================================
// Error Taxonomy Tests
// =============================================================================

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { status } from "@grpc/grpc-js";
import { Effect } from "effect";
import {
  GRPC_ERROR_KINDS,
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
  createNotConnectedError,
  failWithGrpcError,
  fromGrpcError,
  isApiClientError,
  isClientNotConnected,
  isGrpcError,
  isRetryable,
  isWireError,
  type GrpcErrorTag,
} from "../index";

const SERVER_URL = "grpc://localhost:50051";

const classify = (code: number, details?: string, debugErrorString?: string) =>
  fromGrpcError({
    serverUrl: SERVER_URL,
    operation: "listItems",
    grpcError: { code, details, debugErrorString },
  });

describe("Classification", () => {
  it.each([
    [status.CANCELLED, OperationCancelled, true],
    [status.UNKNOWN, UnknownError, true],
    [status.INVALID_ARGUMENT, InvalidArgument, false],
    [status.DEADLINE_EXCEEDED, OperationTimedOut, true],
    [status.NOT_FOUND, EntityNotFound, true],
    [status.ALREADY_EXISTS, EntityAlreadyExists, true],
    [status.PERMISSION_DENIED, PermissionDenied, true],
    [status.RESOURCE_EXHAUSTED, ResourceExhausted, true],
    [status.FAILED_PRECONDITION, OperationPreconditionFailed, true],
    [status.ABORTED, OperationAborted, true],
    [status.OUT_OF_RANGE, OperationOutOfRange, true],
    [status.UNIMPLEMENTED, OperationNotImplemented, false],
    [status.INTERNAL, InternalError, true],
    [status.UNAVAILABLE, ServiceUnavailable, true],
    [status.DATA_LOSS, DataLoss, false],
    [status.UNAUTHENTICATED, OperationUnauthenticated, false],
  ])("should classify status %i", (code, ErrorClass, retryable) => {
    const error = classify(code);
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.retryable).toBe(retryable);
    expect(error.status).toBe(code);
  });

  it("should map OK and unknown codes to UnrecognizedGrpcStatus", () => {
    const ok = classify(status.OK);
    expect(ok).toBeInstanceOf(UnrecognizedGrpcStatus);
    expect(ok.statusName).toBe("OK");
    expect(ok.retryable).toBe(true);

    const unknown = classify(99);
    expect(unknown._tag).toBe("UnrecognizedGrpcStatus");
    expect(unknown.statusName).toBe("99");
    expect(unknown.message).toBe(
      "Failed calling 'listItems' on 'grpc://localhost:50051': Got an unrecognized status code <status=99>",
    );
  });

  it("should flag exactly four kinds as permanent", () => {
    const permanent = Object.entries(GRPC_ERROR_KINDS)
      .filter(([, kind]) => !kind.retryable)
      .map(([tag]) => tag);
    expect(permanent).toEqual([
      "InvalidArgument",
      "OperationNotImplemented",
      "DataLoss",
      "OperationUnauthenticated",
    ]);
  });

  it("should classify every code consistently with the kind table", () => {
    fc.assert(
      fc.property(fc.integer({ min: -50, max: 50 }), (code) => {
        const error = classify(code);
        const tag: GrpcErrorTag = error._tag;
        expect(error.retryable).toBe(GRPC_ERROR_KINDS[tag].retryable);
        expect(error.description).toBe(GRPC_ERROR_KINDS[tag].description);
        expect(tag === "UnrecognizedGrpcStatus").toBe(code < 1 || code > 16);
      }),
    );
  });
});

describe("Error Messages", () => {
  it("should include the status, server message and debug string", () => {
    const error = classify(status.UNAVAILABLE, "connection refused", "dbg");
    expect(error.message).toBe(
      "Failed calling 'listItems' on 'grpc://localhost:50051': The service is currently unavailable <status=UNAVAILABLE>: connection refused (dbg)",
    );
    expect(error.serverUrl).toBe(SERVER_URL);
    expect(error.operation).toBe("listItems");
    expect(error.statusName).toBe("UNAVAILABLE");
  });

  it("should omit an empty server message", () => {
    const error = classify(status.NOT_FOUND, "");
    expect(error.message).toBe(
      "Failed calling 'listItems' on 'grpc://localhost:50051': The requested entity was not found <status=NOT_FOUND>",
    );
  });

  it("should keep the wire error as the cause", () => {
    const grpcError = { code: status.ABORTED, details: "conflict" };
    const error = fromGrpcError({
      serverUrl: SERVER_URL,
      operation: "updateItem",
      grpcError,
    });
    expect(error.cause).toBe(grpcError);
  });
});

describe("ClientNotConnected", () => {
  it("should be retryable and name the operation", () => {
    const error = createNotConnectedError(SERVER_URL, "stub");
    expect(error).toBeInstanceOf(ClientNotConnected);
    expect(error.retryable).toBe(true);
    expect(isRetryable(error)).toBe(true);
    expect(error.message).toBe(
      "Failed calling 'stub' on 'grpc://localhost:50051': The client is not connected to the server",
    );
  });
});

describe("Type Guards", () => {
  it("should recognize wire errors", () => {
    expect(isWireError({ code: 14 })).toBe(true);
    expect(isWireError({ code: 14, details: "reset" })).toBe(true);
    expect(isWireError(Object.assign(new Error("x"), { code: 2 }))).toBe(true);
    expect(isWireError({ code: "14" })).toBe(false);
    expect(isWireError({ code: 14, details: 5 })).toBe(false);
    expect(isWireError(null)).toBe(false);
    expect(isWireError("UNAVAILABLE")).toBe(false);
  });

  it("should tell API client errors apart", () => {
    const grpcError = classify(status.INTERNAL);
    const notConnected = createNotConnectedError(SERVER_URL, "channel");

    expect(isApiClientError(grpcError)).toBe(true);
    expect(isApiClientError(notConnected)).toBe(true);
    expect(isApiClientError(new Error("boom"))).toBe(false);
    expect(isApiClientError({ _tag: "InternalError" })).toBe(false);

    expect(isGrpcError(grpcError)).toBe(true);
    expect(isGrpcError(notConnected)).toBe(false);
    expect(isClientNotConnected(notConnected)).toBe(true);
    expect(isClientNotConnected(grpcError)).toBe(false);
  });
});

describe("Effect Integration", () => {
  it("should let callers recover from specific kinds by tag", async () => {
    const program = failWithGrpcError({
      serverUrl: SERVER_URL,
      operation: "getItem",
      grpcError: { code: status.NOT_FOUND },
    }).pipe(
      Effect.catchTags({
        EntityNotFound: (error) => Effect.succeed(`missing: ${error.operation}`),
      }),
    );

    await expect(Effect.runPromise(program)).resolves.toBe("missing: getItem");
  });
});
