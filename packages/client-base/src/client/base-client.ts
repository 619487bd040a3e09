// =============================================================================
// Base API Client
// =============================================================================
// Connection lifecycle shared by every concrete API client.

import type { ChannelInterface as Channel } from "@grpc/grpc-js";
import { Effect } from "effect";
import type { ApiClientError, GrpcError } from "../core/errors";
import {
  createNotConnectedError,
  failWithGrpcError,
  failWithNotConnected,
  isWireError,
} from "../core/error-utils";
import type {
  ClientLogger,
  CreateStub,
  GrpcChannelTarget,
  GrpcStub,
} from "../core/types";
import { parseGrpcUriOrThrow, type ParseGrpcUriOptions } from "../channel/uri";
import { safeLog } from "../services/logger";
import { runPromiseUnwrapped } from "../utils/run";

export interface BaseApiClientOptions {
  /**
   * Connect as soon as the client is created. When `false`, nothing happens
   * until {@link BaseApiClient.connect} is called.
   * @default true
   */
  readonly autoConnect?: boolean;
  /** Defaults applied when the server URL omits the port or `ssl` */
  readonly config?: ParseGrpcUriOptions;
  readonly logger?: ClientLogger;
}

interface Connection<Stub> {
  readonly target: GrpcChannelTarget;
  readonly stub: Stub;
}

/**
 * Common base of API clients talking to a gRPC server.
 *
 * Subclasses expose the server's operations on top of {@link call}, which
 * turns transport failures into classified {@link ApiClientError}s.
 *
 * @example
 * ```ts
 * class WeatherClient extends BaseApiClient<WeatherServiceClient> {
 *   constructor(serverUrl: string) {
 *     super(serverUrl, (address, creds) => new WeatherServiceClient(address, creds));
 *   }
 *
 *   forecast(city: string) {
 *     return this.callPromise("forecast", (stub) => promisify(stub.forecast)({ city }));
 *   }
 * }
 * ```
 */
export class BaseApiClient<Stub extends GrpcStub> {
  private currentUrl: string;
  private connection: Connection<Stub> | undefined;

  constructor(
    serverUrl: string,
    private readonly createStub: CreateStub<Stub>,
    private readonly options: BaseApiClientOptions = {},
  ) {
    this.currentUrl = serverUrl;
    if (options.autoConnect ?? true) {
      this.connect(serverUrl);
    }
  }

  get serverUrl(): string {
    return this.currentUrl;
  }

  get isConnected(): boolean {
    return this.connection !== undefined;
  }

  /**
   * The underlying gRPC stub. Prefer the operations exposed by the client.
   *
   * @throws {ClientNotConnected} when the client is not connected
   */
  get stub(): Stub {
    if (!this.connection) {
      throw createNotConnectedError(this.currentUrl, "stub");
    }
    return this.connection.stub;
  }

  /**
   * The channel used by the stub.
   *
   * @throws {ClientNotConnected} when the client is not connected
   */
  get channel(): Channel {
    if (!this.connection) {
      throw createNotConnectedError(this.currentUrl, "channel");
    }
    return this.connection.stub.getChannel();
  }

  /**
   * Connect to the server, possibly using a new URL.
   *
   * Does nothing when already connected to the same URL. Call
   * {@link disconnect} first to force a reconnection.
   *
   * @throws {InvalidGrpcUriError} when the URL can't be parsed
   */
  connect(serverUrl?: string): void {
    if (serverUrl !== undefined && serverUrl !== this.currentUrl) {
      this.currentUrl = serverUrl;
    } else if (this.connection) {
      return;
    }

    const target = parseGrpcUriOrThrow(this.currentUrl, this.options.config);
    const previous = this.connection;
    this.connection = {
      target,
      stub: this.createStub(target.address, target.credentials),
    };
    previous?.stub.close();
    this.debug(`Connected to ${target.address}`, {
      serverUrl: this.currentUrl,
      ssl: target.ssl,
    });
  }

  /** Close the connection. Does nothing when not connected. */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = undefined;
    connection.stub.close();
    this.debug(`Disconnected from ${connection.target.address}`);
  }

  /**
   * Run an operation against the stub.
   *
   * Fails with {@link ClientNotConnected} before touching the stub when the
   * client is disconnected, and with the matching {@link GrpcError} when the
   * server answers with an error status. Any other rejection is a defect.
   */
  call<A>(
    operation: string,
    fn: (stub: Stub) => Promise<A>,
  ): Effect.Effect<A, ApiClientError> {
    return Effect.suspend((): Effect.Effect<A, ApiClientError> => {
      const connection = this.connection;
      if (!connection) {
        return failWithNotConnected(this.currentUrl, operation);
      }
      const serverUrl = this.currentUrl;
      return Effect.tryPromise({
        try: () => fn(connection.stub),
        catch: (error) => error,
      }).pipe(
        Effect.catchAll((error): Effect.Effect<never, GrpcError> =>
          isWireError(error)
            ? failWithGrpcError({ serverUrl, operation, grpcError: error })
            : Effect.die(error),
        ),
      );
    });
  }

  /** Promise variant of {@link call}, rejecting with the error itself */
  callPromise<A>(
    operation: string,
    fn: (stub: Stub) => Promise<A>,
  ): Promise<A> {
    return runPromiseUnwrapped(this.call(operation, fn));
  }

  private debug(message: string, data?: unknown): void {
    const logger = this.options.logger;
    if (logger) {
      Effect.runSync(safeLog(logger, "debug", message, data));
    }
  }
}
