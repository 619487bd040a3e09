// =============================================================================
// gRPC URI Parsing
// =============================================================================
// Turns `grpc://host[:port][?ssl=<bool>]` into connection parameters.

import { credentials } from "@grpc/grpc-js";
import { Effect, Either } from "effect";
import { InvalidGrpcUriError } from "../core/errors";
import type { ClientConfig, GrpcChannelTarget } from "../core/types";
import { ClientConfigService } from "../services/config";

const TRUE_VALUES: ReadonlySet<string> = new Set(["true", "on", "1"]);
const FALSE_VALUES: ReadonlySet<string> = new Set(["false", "off", "0"]);

const invalid = (uri: string, message: string) =>
  Effect.fail(new InvalidGrpcUriError({ uri, message }));

const parseBool = (
  uri: string,
  value: string,
): Effect.Effect<boolean, InvalidGrpcUriError> => {
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return Effect.succeed(true);
  if (FALSE_VALUES.has(normalized)) return Effect.succeed(false);
  return invalid(uri, `Invalid boolean value '${value}' in the URI '${uri}'`);
};

/** Query parameters with blank values dropped and the last repetition kept */
const lastQueryValues = (url: URL): Map<string, string> => {
  const options = new Map<string, string>();
  for (const [key, value] of url.searchParams) {
    if (value !== "") options.set(key, value);
  }
  return options;
};

/**
 * Parse a gRPC URI into the parameters needed to open a channel.
 *
 * - The scheme must be `grpc` and a host name is required.
 * - Paths, fragments and user credentials are rejected.
 * - The port defaults to the configured `defaultPort`.
 * - `ssl` is the only query parameter, a boolean (`true`, `on`, `1`, `false`,
 *   `off`, `0`, case-insensitive) defaulting to the configured `defaultSsl`.
 *   When repeated, the last value wins.
 */
export const parseGrpcUri = (
  uri: string,
): Effect.Effect<GrpcChannelTarget, InvalidGrpcUriError, ClientConfigService> =>
  Effect.gen(function* () {
    const config = yield* ClientConfigService;

    const url = yield* Effect.try({
      try: () => new URL(uri),
      catch: () =>
        new InvalidGrpcUriError({ uri, message: `Invalid URI '${uri}'` }),
    });

    const scheme = url.protocol.replace(/:$/, "");
    if (scheme !== "grpc") {
      return yield* invalid(
        uri,
        `Invalid scheme '${scheme}' in the URI, expected 'grpc'`,
      );
    }

    const hostname = url.hostname.toLowerCase();
    if (!hostname) {
      return yield* invalid(uri, `Host name is missing in URI '${uri}'`);
    }

    const unexpected: ReadonlyArray<readonly [string, string]> = [
      ["path", url.pathname],
      ["fragment", url.hash.replace(/^#/, "")],
      ["username", url.username],
      ["password", url.password],
    ];
    for (const [component, value] of unexpected) {
      if (value) {
        return yield* invalid(
          uri,
          `Unexpected ${component} '${value}' in the URI '${uri}'`,
        );
      }
    }

    const options = lastQueryValues(url);
    const sslOption = options.get("ssl");
    options.delete("ssl");
    if (options.size > 0) {
      const names = [...options.keys()].map((name) => `'${name}'`).join(", ");
      return yield* invalid(
        uri,
        `Unexpected query parameters ${names} in the URI '${uri}'`,
      );
    }

    const ssl =
      sslOption === undefined
        ? config.defaultSsl
        : yield* parseBool(uri, sslOption);
    const port = Number(url.port) || config.defaultPort;
    // IPv6 literals keep their brackets in the address only
    const host = hostname.replace(/^\[(.*)\]$/, "$1");

    return {
      host,
      port,
      ssl,
      address: `${hostname}:${port}`,
      credentials: ssl
        ? credentials.createSsl()
        : credentials.createInsecure(),
    };
  });

export type ParseGrpcUriOptions = Partial<
  Pick<ClientConfig, "defaultPort" | "defaultSsl">
>;

/**
 * Promise-free variant of {@link parseGrpcUri} that throws the
 * {@link InvalidGrpcUriError} instead of failing an effect.
 */
export const parseGrpcUriOrThrow = (
  uri: string,
  options: ParseGrpcUriOptions = {},
): GrpcChannelTarget => {
  const result = Effect.runSync(
    parseGrpcUri(uri).pipe(
      Effect.provide(ClientConfigService.layer(options)),
      Effect.either,
    ),
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
};
