import type { FastifyInstance } from "fastify";
import { Server as SocketIOServer } from "socket.io";
import { PROTOCOL_VERSION, isClientToServer, type ServerToClient } from "@piblocks/shared";
import type { ServerConfig } from "./config.js";
import { SOCKET_EVENT, SOCKET_PATH } from "./net/events.js";
import { SimulationSession } from "./sessions/SimulationSession.js";

export type RealtimeHandle = {
  io: SocketIOServer;
  sessionCount: () => number;
};

export function attachRealtime(app: FastifyInstance, config: ServerConfig): RealtimeHandle {
  const io = new SocketIOServer(app.server, {
    path: SOCKET_PATH,
    cors: {
      origin: true,
      methods: ["GET", "POST"]
    }
  });

  const sessions = new Map<string, SimulationSession>();

  io.on("connection", (socket) => {
    app.log.info({ sid: socket.id }, "socket connected");

    const session = new SimulationSession(
      socket.id,
      (msg) => socket.emit(SOCKET_EVENT, msg),
      app.log,
      { dt: config.simDt, tickEveryMs: config.tickEveryMs, maxMass: config.maxMass }
    );
    sessions.set(socket.id, session);

    socket.emit(SOCKET_EVENT, {
      t: "hello",
      protocol: PROTOCOL_VERSION,
      sid: socket.id
    } satisfies ServerToClient);

    socket.on(SOCKET_EVENT, (raw: unknown) => {
      if (!isClientToServer(raw)) {
        socket.emit(SOCKET_EVENT, {
          t: "error",
          code: "bad_message",
          message: "Unrecognized message."
        } satisfies ServerToClient);
        return;
      }

      if (raw.t === "ping") {
        socket.emit(SOCKET_EVENT, {
          t: "pong",
          clientTimeMs: raw.clientTimeMs,
          serverTimeMs: Date.now()
        } satisfies ServerToClient);
        return;
      }

      session.handleCommand(raw);
    });

    socket.on("disconnect", () => {
      app.log.info({ sid: socket.id }, "socket disconnected");
      session.dispose();
      sessions.delete(socket.id);
    });
  });

  app.addHook("onClose", async () => {
    for (const session of sessions.values()) session.dispose();
    sessions.clear();
    io.disconnectSockets(true);
  });

  return { io, sessionCount: () => sessions.size };
}
