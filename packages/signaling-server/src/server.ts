import { randomBytes } from "node:crypto";
import Fastify, { type FastifyInstance } from "fastify";
import websocket from "@fastify/websocket";
import {
  SignalingInboundSchema,
  UserTokenRequestSchema,
  type SignalingErrorMessage,
  type UserTokenResponse,
} from "@peerlink/signaling-contracts";
import {
  assertControlAuth,
  mintAttestation,
  mintSessionToken,
  mintUserToken,
  verifySessionToken,
  verifyUserToken,
} from "./auth.js";
import { ChannellingApi } from "./channelling.js";
import type { AppConfig } from "./config.js";
import { ContactTokenCodec } from "./contact-token.js";
import { ContactManager } from "./contacts.js";
import { JsonOutgoingEncoder, type OutgoingEncoder } from "./encoder.js";
import { FixedWindowRateLimiter } from "./rate-limit.js";
import { ConnectionRegistry } from "./registry.js";
import { RelayCredentialIssuer } from "./relay-credentials.js";
import { InMemoryRoomManager } from "./room-manager.js";
import { MessageRouter } from "./router.js";
import { Session } from "./session.js";
import { decodeFrame, WebSocketClient } from "./ws-client.js";

interface ServerDeps {
  encoder?: OutgoingEncoder;
  nowMs?: () => number;
}

function socketError(code: string, message: string, recoverable: boolean): string {
  const error: SignalingErrorMessage = { type: "error", code, message, recoverable };
  return JSON.stringify(error);
}

function newSessionId(): string {
  return randomBytes(18).toString("base64url");
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 1_000_000,
    logger: {
      level: config.logLevel,
      transport: config.logPretty ? { target: "pino-pretty" } : undefined,
    },
  });

  await app.register(websocket);

  const encoder = deps.encoder ?? new JsonOutgoingEncoder();
  const registry = new ConnectionRegistry(app.log.child({ component: "registry" }));
  const rooms = new InMemoryRoomManager(encoder, config.maxRoomUsers, app.log.child({ component: "rooms" }));
  const router = new MessageRouter(registry, rooms, encoder, app.log.child({ component: "router" }));
  const userTokenLimiter = new FixedWindowRateLimiter({
    maxPerWindow: config.userTokensPerMinutePerIp,
    windowMs: 60_000,
    nowMs: deps.nowMs,
  });

  const api = new ChannellingApi({
    version: config.serverVersion,
    registry,
    router,
    rooms,
    relayCredentials: new RelayCredentialIssuer({
      secret: config.turnSecret,
      ttlSec: config.turnTtlSec,
      urls: config.turnUris,
      nowMs: deps.nowMs,
    }),
    contacts: new ContactManager(registry, new ContactTokenCodec(config.sessionSecret, config.encryptionSecret)),
    broadcastLimiter: new FixedWindowRateLimiter({
      maxPerWindow: config.maxBroadcastPerSecond,
      windowMs: 1000,
      nowMs: deps.nowMs,
    }),
    mintSessionToken: (session) => mintSessionToken(
      session.userid ? { sid: session.id, userid: session.userid } : { sid: session.id },
      config.sessionSecret,
      config.userTokenTtlSec,
    ),
    logger: app.log.child({ component: "channelling" }),
  });

  let connectionIndex = 0;

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async () => ({
    ok: true,
    version: config.serverVersion,
    clients: registry.snapshot(false).count,
    relayAuth: config.turnSecret.length > 0,
  }));

  app.get("/stats", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }
    return reply.send({ ...registry.snapshot(true), rooms: rooms.stats() });
  });

  app.post("/users/tokens", async (request, reply) => {
    if (!userTokenLimiter.allow(`tokens:${request.ip}`)) {
      return reply.code(429).send({ error: "rate_limited" });
    }

    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const parsed = UserTokenRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const response: UserTokenResponse = {
      userid: parsed.data.userid,
      token: mintUserToken({ userid: parsed.data.userid }, config.sessionSecret, config.userTokenTtlSec),
      expiresAtMs: Date.now() + (config.userTokenTtlSec * 1000),
    };
    return reply.send(response);
  });

  app.get("/ws", { websocket: true }, (socket, request) => {
    const requestUrl = new URL(request.url, "http://localhost");
    const userToken = requestUrl.searchParams.get("user") ?? "";
    const sessionToken = requestUrl.searchParams.get("session") ?? "";

    let sessionId = newSessionId();
    let userid = "";
    try {
      if (userToken) {
        userid = verifyUserToken(userToken, config.sessionSecret).userid;
      }
      if (sessionToken) {
        const claims = verifySessionToken(sessionToken, config.sessionSecret);
        if (userToken && claims.userid !== userid) {
          throw new Error("Session belongs to another user");
        }
        sessionId = claims.sid;
        userid = claims.userid ?? userid;
      }
    } catch (error) {
      request.log.info({ err: error }, "rejected websocket authentication");
      socket.send(socketError("auth_failed", "Invalid user or session token", true));
      socket.close(4401, "unauthorized");
      return;
    }

    connectionIndex += 1;
    const session = new Session(sessionId, mintAttestation(sessionId, config.sessionSecret), userid);
    const client = new WebSocketClient(socket, session, connectionIndex);
    api.onConnect(client);

    socket.on("message", (raw) => {
      let parsedJson: unknown;
      try {
        parsedJson = JSON.parse(decodeFrame(raw));
      } catch {
        socket.send(socketError("invalid_json", "Inbound socket payload is not valid JSON", false));
        socket.close(4400, "invalid_json");
        return;
      }

      const parsedMessage = SignalingInboundSchema.safeParse(parsedJson);
      if (!parsedMessage.success) {
        socket.send(socketError("invalid_message", "Inbound socket message failed validation", false));
        socket.close(4400, "invalid_message");
        return;
      }

      try {
        api.onIncoming(client, parsedMessage.data);
      } catch (error) {
        request.log.error({ err: error, sessionId: session.id }, "failed to handle signaling message");
        socket.send(socketError("internal_error", "Message could not be handled", true));
      }
    });

    socket.on("close", () => {
      api.onDisconnect(client);
    });
  });

  return app;
}
