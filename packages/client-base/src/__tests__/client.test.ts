// =============================================================================
// Base API Client Tests
// =============================================================================

import { describe, it, expect, vi } from "vitest";
import { Client, status, type ChannelCredentials } from "@grpc/grpc-js";
import { Effect } from "effect";
import {
  BaseApiClient,
  ClientNotConnected,
  EntityNotFound,
  InvalidGrpcUriError,
} from "../index";

const SERVER_URL = "grpc://localhost:50051?ssl=false";

const createStubFactory = () =>
  vi.fn(
    (address: string, credentials: ChannelCredentials) =>
      new Client(address, credentials),
  );

describe("BaseApiClient", () => {
  describe("Connection", () => {
    it("should connect on creation by default", async () => {
      const createStub = createStubFactory();
      const client = new BaseApiClient(SERVER_URL, createStub);

      expect(client.isConnected).toBe(true);
      expect(createStub).toHaveBeenCalledTimes(1);
      expect(createStub.mock.calls[0]?.[0]).toBe("localhost:50051");
      expect(client.channel).toBe(client.stub.getChannel());

      await client.disconnect();
    });

    it("should wait for connect when autoConnect is off", async () => {
      const createStub = createStubFactory();
      const client = new BaseApiClient(SERVER_URL, createStub, {
        autoConnect: false,
      });

      expect(client.isConnected).toBe(false);
      expect(createStub).not.toHaveBeenCalled();

      client.connect();
      expect(client.isConnected).toBe(true);
      expect(client.serverUrl).toBe(SERVER_URL);

      await client.disconnect();
    });

    it("should do nothing when connecting again to the same URL", async () => {
      const createStub = createStubFactory();
      const client = new BaseApiClient(SERVER_URL, createStub);

      client.connect();
      client.connect(SERVER_URL);
      expect(createStub).toHaveBeenCalledTimes(1);

      await client.disconnect();
    });

    it("should replace the stub when connecting to a new URL", async () => {
      const createStub = createStubFactory();
      const client = new BaseApiClient(SERVER_URL, createStub);
      const previous = client.stub;
      const close = vi.spyOn(previous, "close");

      client.connect("grpc://example.com?ssl=false");

      expect(client.serverUrl).toBe("grpc://example.com?ssl=false");
      expect(createStub).toHaveBeenCalledTimes(2);
      expect(createStub.mock.calls[1]?.[0]).toBe("example.com:9090");
      expect(close).toHaveBeenCalledTimes(1);
      expect(client.stub).not.toBe(previous);

      await client.disconnect();
    });

    it("should close the stub on disconnect, once", async () => {
      const client = new BaseApiClient(SERVER_URL, createStubFactory());
      const close = vi.spyOn(client.stub, "close");

      await client.disconnect();
      await client.disconnect();

      expect(client.isConnected).toBe(false);
      expect(close).toHaveBeenCalledTimes(1);
    });

    it("should reject an invalid URL", () => {
      expect(
        () => new BaseApiClient("http://localhost", createStubFactory()),
      ).toThrow(InvalidGrpcUriError);
    });

    it("should log connection changes", async () => {
      const logger = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const client = new BaseApiClient(SERVER_URL, createStubFactory(), {
        logger,
      });
      await client.disconnect();

      expect(logger.debug.mock.calls.map(([message]) => message)).toEqual([
        "Connected to localhost:50051",
        "Disconnected from localhost:50051",
      ]);
    });
  });

  describe("Logging", () => {
    it("should connect and disconnect even when the logger throws", async () => {
      const fail = () => {
        throw new Error("log sink down");
      };
      const client = new BaseApiClient(SERVER_URL, createStubFactory(), {
        logger: { debug: fail, info: fail, warn: fail, error: fail },
      });
      expect(client.isConnected).toBe(true);

      await client.disconnect();
      expect(client.isConnected).toBe(false);
    });
  });

  describe("Not Connected", () => {
    it("should refuse access to the stub and the channel", () => {
      const client = new BaseApiClient(SERVER_URL, createStubFactory(), {
        autoConnect: false,
      });

      expect(() => client.stub).toThrow(ClientNotConnected);
      expect(() => client.stub).toThrow(
        "Failed calling 'stub' on 'grpc://localhost:50051?ssl=false': The client is not connected to the server",
      );
      expect(() => client.channel).toThrow(
        "Failed calling 'channel' on 'grpc://localhost:50051?ssl=false': The client is not connected to the server",
      );
    });

    it("should fail calls without touching the stub", async () => {
      const client = new BaseApiClient(SERVER_URL, createStubFactory(), {
        autoConnect: false,
      });
      const fn = vi.fn(async () => "never");

      const error = await Effect.runPromise(
        Effect.flip(client.call("listItems", fn)),
      );

      expect(error).toBeInstanceOf(ClientNotConnected);
      expect(error.operation).toBe("listItems");
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe("Calls", () => {
    it("should resolve with the operation result", async () => {
      const client = new BaseApiClient(SERVER_URL, createStubFactory());

      await expect(
        client.callPromise("getItem", async () => ({ id: 1 })),
      ).resolves.toEqual({ id: 1 });

      await client.disconnect();
    });

    it("should classify wire errors", async () => {
      const client = new BaseApiClient(SERVER_URL, createStubFactory());
      const wireError = Object.assign(new Error("5 NOT_FOUND: no such item"), {
        code: status.NOT_FOUND,
        details: "no such item",
      });

      const error = await Effect.runPromise(
        Effect.flip(
          client.call("getItem", async () => {
            throw wireError;
          }),
        ),
      );

      expect(error).toBeInstanceOf(EntityNotFound);
      expect(error.message).toBe(
        "Failed calling 'getItem' on 'grpc://localhost:50051?ssl=false': The requested entity was not found <status=NOT_FOUND>: no such item",
      );

      await client.disconnect();
    });

    it("should reject with other failures untouched", async () => {
      const client = new BaseApiClient(SERVER_URL, createStubFactory());
      const failure = new TypeError("bad request shape");

      await expect(
        client.callPromise("getItem", async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);

      await client.disconnect();
    });
  });
});
