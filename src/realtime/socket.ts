// src/realtime/socket.ts
import { Server } from "socket.io";
import { createAdapter } from "@socket.io/redis-adapter";
import { Redis } from "ioredis";
import type { Server as HttpServer } from "http";
import env from "../config/env";
import logger from "../middleware/requestLogger";
import { verifyAccessToken } from "../utils/jwt";
import { can } from "../utils/rbac";
import type { AuthUser } from "../directory/users";
import type { AccessService } from "../services/access";
import type { MembershipEvents } from "./events";

export const room = {
  user: (userId: string) => `user:${userId}`,
  project: (projectId: string) => `project:${projectId}`,
};

interface ClientToServerEvents {
  "subscribe:project": (payload: { projectId?: string }) => void;
  "unsubscribe:project": (payload: { projectId?: string }) => void;
}

interface ServerToClientEvents {
  error: (payload: { message: string }) => void;
  "subscribed:project": (payload: { projectId: string }) => void;
  "unsubscribed:project": (payload: { projectId: string }) => void;
  "invitation:received": (payload: { invitationId: string; projectId: string }) => void;
  "collaborator:added": (payload: { projectId: string; collaborator: unknown }) => void;
  "collaborator:updated": (payload: { projectId: string; collaborator: unknown }) => void;
  "collaborator:removed": (payload: { projectId: string; collaboratorId: string; userId: string }) => void;
  "project:deleted": (payload: { projectId: string }) => void;
}

type SocketData = { user: AuthUser };

export type IO = Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;

let ioSingleton: IO | null = null;
// keep these so we can close them on shutdown
let redisPub: Redis | null = null;
let redisSub: Redis | null = null;

/** Socket.IO server with auth and room handling, on the default in-memory adapter. */
export function createRealtimeServer(httpServer: HttpServer, access: AccessService): IO {
  const allowOrigins = env.WS_ALLOW_ORIGINS
    .split(",")
    .map(s => s.trim())
    .filter(Boolean);

  const io: IO = new Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>(httpServer, {
    cors: allowOrigins.length ? { origin: allowOrigins, credentials: true } : undefined,
    connectionStateRecovery: { maxDisconnectionDuration: 60_000, skipMiddlewares: true },
  });

  // auth middleware
  io.use((socket, next) => {
    const fromAuth: unknown = socket.handshake.auth?.token;
    const header = socket.handshake.headers.authorization;
    const token = typeof fromAuth === "string"
      ? fromAuth
      : header?.startsWith("Bearer ") ? header.slice(7) : undefined;
    if (!token) return next(new Error("Missing auth token"));
    try {
      const payload = verifyAccessToken(token);
      socket.data.user = { id: payload.id, email: payload.email.toLowerCase(), name: payload.name };
      next();
    } catch {
      next(new Error("Invalid or expired token"));
    }
  });

  io.on("connection", (socket) => {
    const user = socket.data.user;
    const log = logger.child({ socketId: socket.id, userId: user.id });
    void socket.join(room.user(user.id));

    socket.on("subscribe:project", async (payload) => {
      const projectId = payload?.projectId;
      if (!projectId) return socket.emit("error", { message: "projectId required" });
      try {
        const resolved = await access.resolve({ actor: user, log }, projectId);
        if (!resolved || !can(resolved.role, "view_members")) {
          return socket.emit("error", { message: "Project not found" });
        }
        await socket.join(room.project(projectId));
        socket.emit("subscribed:project", { projectId });
      } catch (err) {
        log.error({ err, projectId }, "project subscription failed");
        socket.emit("error", { message: "Subscription failed" });
      }
    });

    socket.on("unsubscribe:project", (payload) => {
      const projectId = payload?.projectId;
      if (!projectId) return;
      void socket.leave(room.project(projectId));
      socket.emit("unsubscribed:project", { projectId });
    });
  });

  return io;
}

/** Process-wide server, fanned out across instances through Redis. */
export function initRealtime(httpServer: HttpServer, access: AccessService) {
  if (ioSingleton) return ioSingleton;
  const io = createRealtimeServer(httpServer, access);

  redisPub = new Redis(env.REDIS_URL);
  redisSub = redisPub.duplicate();
  io.adapter(createAdapter(redisPub, redisSub));

  ioSingleton = io;
  return io;
}

export async function closeRealtime() {
  // close socket.io first (stops using redis)
  const io = ioSingleton;
  if (io) {
    ioSingleton = null;
    await new Promise<void>((resolve) => io.close(() => resolve()));
  }
  // then close redis connections
  for (const client of [redisSub, redisPub]) {
    if (client) await client.quit();
  }
  redisSub = null;
  redisPub = null;
}

/**
 * Publishers over whatever server `current` returns; no-ops while it is null.
 * Losing access also drops the user's sockets from the project room, since
 * membership there is only checked on subscribe.
 */
export function createSocketEvents(current: () => IO | null): MembershipEvents {
  return {
    invitationReceived(userId, invitation) {
      current()?.to(room.user(userId)).emit("invitation:received", {
        invitationId: invitation.id,
        projectId: invitation.projectId,
      });
    },
    collaboratorAdded(projectId, collaborator) {
      current()?.to(room.project(projectId)).to(room.user(collaborator.userId)).emit("collaborator:added", { projectId, collaborator });
    },
    collaboratorUpdated(projectId, collaborator) {
      current()?.to(room.project(projectId)).to(room.user(collaborator.userId)).emit("collaborator:updated", { projectId, collaborator });
    },
    collaboratorRemoved(projectId, collaborator) {
      const io = current();
      if (!io) return;
      io.to(room.project(projectId)).to(room.user(collaborator.userId)).emit("collaborator:removed", {
        projectId,
        collaboratorId: collaborator.id,
        userId: collaborator.userId,
      });
      io.in(room.user(collaborator.userId)).socketsLeave(room.project(projectId));
    },
    projectDeleted(projectId) {
      const io = current();
      if (!io) return;
      io.to(room.project(projectId)).emit("project:deleted", { projectId });
      io.in(room.project(projectId)).socketsLeave(room.project(projectId));
    },
  };
}

export const socketEvents = createSocketEvents(() => ioSingleton);
