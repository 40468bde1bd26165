import * as grpc from "@grpc/grpc-js";
import { afterAll, afterEach, beforeAll, describe, expect, test } from "vitest";
import { loadDaemonMethods } from "../../api/transport";
import { GrpcDaemonClient } from "../../services/daemon-client";

type ControlRequest = { command?: number };

// In-process daemon on a loopback port picked by the OS
function startServer(
  implementation: grpc.UntypedServiceImplementation,
): Promise<{ server: grpc.Server; port: number }> {
  const server = new grpc.Server();
  server.addService(loadDaemonMethods()._unsafeUnwrap(), implementation);
  return new Promise((resolve, reject) => {
    server.bindAsync("127.0.0.1:0", grpc.ServerCredentials.createInsecure(), (error, port) => {
      if (error) reject(error);
      else resolve({ server, port });
    });
  });
}

describe("GrpcDaemonClient against a local server", () => {
  let server: grpc.Server;
  let address: string;
  let receivedCommands: number[];
  let client: GrpcDaemonClient;

  beforeAll(async () => {
    receivedCommands = [];
    const started = await startServer({
      GetStatus: (_call: grpc.ServerUnaryCall<object, object>, callback: grpc.sendUnaryData<object>) => {
        callback(null, { state: 2, version: "3.1.0", uptimeSeconds: 42, message: "ok" });
      },
      // Never answers
      GetMetrics: () => {},
      Control: (
        call: grpc.ServerUnaryCall<ControlRequest, object>,
        callback: grpc.sendUnaryData<object>,
      ) => {
        receivedCommands.push(call.request.command ?? -1);
        callback(null, { success: true, message: "reloaded" });
      },
    });
    server = started.server;
    address = `127.0.0.1:${started.port}`;
  });

  afterEach(() => {
    client.disconnect();
  });

  afterAll(() => {
    server.forceShutdown();
  });

  test("connects and decodes the status reply", async () => {
    client = new GrpcDaemonClient({ connectTimeoutMs: 2000, callTimeoutMs: 2000 });

    const connected = await client.connect(address);
    expect(connected.isOk()).toBe(true);
    expect(client.isConnected()).toBe(true);

    const status = await client.getStatus();
    expect(status._unsafeUnwrap()).toEqual({
      state: "running",
      stateCode: 2,
      version: "3.1.0",
      uptimeSeconds: 42,
      message: "ok",
    });
  });

  test("a call that never completes times out at the call deadline", async () => {
    client = new GrpcDaemonClient({ connectTimeoutMs: 2000, callTimeoutMs: 300 });
    (await client.connect(address))._unsafeUnwrap();

    const metrics = await client.getMetrics();

    expect(metrics._unsafeUnwrapErr().kind).toBe("timeout");
    expect(client.isConnected()).toBe(true);
  });

  test("control sends the wire command code", async () => {
    client = new GrpcDaemonClient({ connectTimeoutMs: 2000, callTimeoutMs: 2000 });
    (await client.connect(address))._unsafeUnwrap();

    const result = await client.sendControl("reload");

    expect(result._unsafeUnwrap()).toEqual({ success: true, message: "reloaded" });
    expect(receivedCommands).toEqual([3]);
  });

  test("connecting to a closed port fails and leaves no session", async () => {
    const closed = await startServer({});
    closed.server.forceShutdown();
    client = new GrpcDaemonClient({ connectTimeoutMs: 300, callTimeoutMs: 300 });

    const result = await client.connect(`127.0.0.1:${closed.port}`);

    expect(result.isErr()).toBe(true);
    expect(client.isConnected()).toBe(false);
  });
});
