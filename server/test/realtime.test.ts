import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { io as connect, type Socket as ClientSocket } from "socket.io-client";
import type { ServerToClient } from "@piblocks/shared";
import { buildApp } from "../src/app.js";
import { loadConfig } from "../src/config.js";
import { attachRealtime, type RealtimeHandle } from "../src/realtime.js";
import { SOCKET_EVENT, SOCKET_PATH } from "../src/net/events.js";

function isOfType<T extends ServerToClient["t"]>(
  msg: ServerToClient,
  t: T
): msg is Extract<ServerToClient, { t: T }> {
  return msg.t === t;
}

function nextMessage<T extends ServerToClient["t"]>(
  client: ClientSocket,
  t: T
): Promise<Extract<ServerToClient, { t: T }>> {
  return new Promise((resolve) => {
    const listener = (msg: ServerToClient) => {
      if (!isOfType(msg, t)) return;
      client.off(SOCKET_EVENT, listener);
      resolve(msg);
    };
    client.on(SOCKET_EVENT, listener);
  });
}

describe("realtime sessions", () => {
  let app: FastifyInstance;
  let realtime: RealtimeHandle;
  let url: string;
  const clients: ClientSocket[] = [];

  beforeAll(async () => {
    const config = loadConfig({ SIMULATE_MAX_MASS: "1000000" });
    app = await buildApp(config, false);
    realtime = attachRealtime(app, config);
    await app.listen({ port: 0, host: "127.0.0.1" });

    const address = app.server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    url = `http://127.0.0.1:${address.port}`;
  });

  afterEach(() => {
    for (const c of clients.splice(0)) c.close();
  });

  afterAll(async () => {
    await app.close();
  });

  function openClient() {
    const client = connect(url, {
      path: SOCKET_PATH,
      transports: ["websocket"],
      autoConnect: false,
      forceNew: true
    });
    clients.push(client);
    return client;
  }

  async function connected() {
    const client = openClient();
    const hello = nextMessage(client, "hello");
    client.connect();
    await hello;
    return client;
  }

  it("greets a new socket with the protocol version", async () => {
    const client = openClient();
    const hello = nextMessage(client, "hello");
    client.connect();

    const msg = await hello;
    expect(msg.protocol).toBe(1);
    expect(msg.sid).toBe(client.id);
  });

  it("answers a malformed payload with bad_message", async () => {
    const client = await connected();
    const error = nextMessage(client, "error");

    client.emit(SOCKET_EVENT, { t: "sim/configure", massLarge: "heavy" });

    expect(await error).toEqual({ t: "error", code: "bad_message", message: "Unrecognized message." });
  });

  it("answers ping with pong", async () => {
    const client = await connected();
    const pong = nextMessage(client, "pong");

    client.emit(SOCKET_EVENT, { t: "ping", clientTimeMs: 42 });

    const msg = await pong;
    expect(msg.clientTimeMs).toBe(42);
    expect(typeof msg.serverTimeMs).toBe("number");
  });

  it("routes sim/configure to the socket's session", async () => {
    const client = await connected();
    const configured = nextMessage(client, "sim/configured");
    const snapshot = nextMessage(client, "sim/snapshot");

    client.emit(SOCKET_EVENT, { t: "sim/configure", massLarge: 100, velocityLarge: -100 });

    const msg = await configured;
    expect(msg.config).toEqual({ massLarge: 100, velocityLarge: -100 });
    expect(msg.theoreticalCount).toBe(31);
    expect((await snapshot).state.massLarge).toBe(100);
  });

  it("reports engine errors with their code", async () => {
    const client = await connected();
    const error = nextMessage(client, "error");

    client.emit(SOCKET_EVENT, { t: "sim/configure", massLarge: 2_000_000, velocityLarge: -1 });

    expect((await error).code).toBe("invalid_configuration");
  });

  it("disposes the session when the socket disconnects", async () => {
    const client = await connected();
    await vi.waitFor(() => expect(realtime.sessionCount()).toBe(1));

    client.disconnect();

    await vi.waitFor(() => expect(realtime.sessionCount()).toBe(0));
  });
});
