import { SignalingOutboundSchema, type SignalingOutbound } from "@peerlink/signaling-contracts";
import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it } from "vitest";
import type { WebSocket } from "ws";
import { mintUserToken, verifyUserToken } from "../src/auth.js";
import { buildServer } from "../src/server.js";
import { decodeFrame } from "../src/ws-client.js";
import { makeConfig } from "./helpers.js";

const apps: FastifyInstance[] = [];
const sockets: WebSocket[] = [];

afterEach(async () => {
  while (sockets.length > 0) {
    sockets.pop()?.terminate();
  }
  while (apps.length > 0) {
    const app = apps.pop();
    if (app) {
      await app.close();
    }
  }
});

async function startServer(overrides: Parameters<typeof makeConfig>[0] = {}): Promise<FastifyInstance> {
  const app = await buildServer(makeConfig(overrides));
  apps.push(app);
  await app.ready();
  return app;
}

async function openSocket(app: FastifyInstance, path: string): Promise<WebSocket> {
  const socket = await app.injectWS(path);
  sockets.push(socket);
  return socket;
}

function nextMessage(socket: WebSocket): Promise<SignalingOutbound> {
  return new Promise((resolve) => {
    socket.once("message", (raw) => {
      resolve(SignalingOutboundSchema.parse(JSON.parse(decodeFrame(raw))));
    });
  });
}

describe("signaling http api", () => {
  it("returns health and ready", async () => {
    const app = await startServer();

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.json().ok).toBe(true);
    expect(health.headers["x-request-id"]).toBeDefined();

    const ready = await app.inject({ method: "GET", url: "/ready" });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({ ok: true, version: "0.0.0+tests", clients: 0, relayAuth: false });
  });

  it("rejects unauthorized user tokens and stats", async () => {
    const app = await startServer();

    const tokenRes = await app.inject({ method: "POST", url: "/users/tokens", payload: { userid: "alice" } });
    expect(tokenRes.statusCode).toBe(401);

    const statsRes = await app.inject({
      method: "GET",
      url: "/stats",
      headers: { authorization: "Bearer wrong-token" },
    });
    expect(statsRes.statusCode).toBe(401);
  });

  it("issues user tokens that verify with the session secret", async () => {
    const app = await startServer();

    const res = await app.inject({
      method: "POST",
      url: "/users/tokens",
      headers: { authorization: "Bearer secret-token" },
      payload: { userid: "alice" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.userid).toBe("alice");
    expect(verifyUserToken(body.token, "test-session-secret")).toEqual({ userid: "alice" });
  });

  it("validates user token requests", async () => {
    const app = await startServer();

    const res = await app.inject({
      method: "POST",
      url: "/users/tokens",
      headers: { authorization: "Bearer secret-token" },
      payload: { userid: "" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });

  it("enforces user token rate limiting", async () => {
    const app = await startServer({ userTokensPerMinutePerIp: 1 });
    const request = {
      method: "POST" as const,
      url: "/users/tokens",
      headers: { authorization: "Bearer secret-token" },
      payload: { userid: "alice" },
    };

    expect((await app.inject(request)).statusCode).toBe(200);
    expect((await app.inject(request)).statusCode).toBe(429);
  });

  it("reports registry stats", async () => {
    const app = await startServer();

    const res = await app.inject({ method: "GET", url: "/stats", headers: { authorization: "Bearer secret-token" } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ count: 0, sessions: {}, connections: {}, rooms: { rooms: 0, members: 0 } });
  });
});

describe("signaling websocket", () => {
  it("identifies an authenticated session and joins a room", async () => {
    const app = await startServer();
    const userToken = mintUserToken({ userid: "alice" }, "test-session-secret", 60);
    const socket = await openSocket(app, `/ws?user=${userToken}`);

    const selfReply = nextMessage(socket);
    socket.send(JSON.stringify({ type: "self" }));
    const self = await selfReply;
    expect(self).toMatchObject({
      type: "self",
      userid: "alice",
      version: "0.0.0+tests",
      turn: { username: "", password: "", ttl: 0, urls: [] },
    });

    const welcomeReply = nextMessage(socket);
    socket.send(JSON.stringify({ type: "hello", roomId: "lobby", ua: "vitest" }));
    expect(await welcomeReply).toEqual({ type: "welcome", roomId: "lobby", users: [] });

    const stats = await app.inject({ method: "GET", url: "/stats", headers: { authorization: "Bearer secret-token" } });
    expect(stats.json().count).toBe(1);
    expect(stats.json().rooms).toEqual({ rooms: 1, members: 1 });
  });

  it("announces a joining session to the rest of the room", async () => {
    const app = await startServer();
    const first = await openSocket(app, "/ws");
    const second = await openSocket(app, "/ws");

    const firstWelcome = nextMessage(first);
    first.send(JSON.stringify({ type: "hello", roomId: "lobby" }));
    await firstWelcome;

    const announcement = nextMessage(first);
    const secondWelcome = nextMessage(second);
    second.send(JSON.stringify({ type: "hello", roomId: "lobby", ua: "second" }));

    const welcome = await secondWelcome;
    const joined = await announcement;
    if (!("type" in welcome) || welcome.type !== "welcome" || !("data" in joined)) {
      throw new Error("expected a welcome reply and an envelope");
    }
    expect(welcome.users).toHaveLength(1);
    expect(joined.to).toBe("");
    expect(joined.data).toMatchObject({ type: "joined", ua: "second", roomId: "lobby" });
    expect(joined.from).not.toBe(welcome.users[0]?.id);
  });

  it("resumes a session id from its session token", async () => {
    const app = await startServer();
    const stale = await openSocket(app, "/ws");
    const staleSelf = nextMessage(stale);
    stale.send(JSON.stringify({ type: "self" }));
    const first = await staleSelf;
    if (!("type" in first) || first.type !== "self") {
      throw new Error("expected a self reply");
    }

    const resumed = await openSocket(app, `/ws?session=${first.token}`);
    const resumedSelf = nextMessage(resumed);
    resumed.send(JSON.stringify({ type: "self" }));

    expect(await resumedSelf).toMatchObject({ type: "self", id: first.id });
    const stats = await app.inject({ method: "GET", url: "/stats", headers: { authorization: "Bearer secret-token" } });
    expect(stats.json().count).toBe(1);
  });

  it("announces that a resumed session left the room it held", async () => {
    const app = await startServer();
    const stale = await openSocket(app, "/ws");
    const peer = await openSocket(app, "/ws");

    const staleSelf = nextMessage(stale);
    stale.send(JSON.stringify({ type: "self" }));
    const first = await staleSelf;
    if (!("type" in first) || first.type !== "self") {
      throw new Error("expected a self reply");
    }
    const staleWelcome = nextMessage(stale);
    stale.send(JSON.stringify({ type: "hello", roomId: "lobby" }));
    await staleWelcome;
    const peerWelcome = nextMessage(peer);
    peer.send(JSON.stringify({ type: "hello", roomId: "lobby" }));
    await peerWelcome;

    const announcement = nextMessage(peer);
    await openSocket(app, `/ws?session=${first.token}`);
    const left = await announcement;

    expect(left).toEqual({
      from: first.id,
      to: "",
      a: expect.any(String),
      data: { type: "left", id: first.id, roomId: "lobby", status: "hard" },
    });
    const usersReply = nextMessage(peer);
    peer.send(JSON.stringify({ type: "users" }));
    expect(await usersReply).toEqual({ type: "users", users: [] });
    const stats = await app.inject({ method: "GET", url: "/stats", headers: { authorization: "Bearer secret-token" } });
    expect(stats.json().rooms).toEqual({ rooms: 1, members: 1 });
  });

  it("rejects malformed frames", async () => {
    const app = await startServer();
    const socket = await openSocket(app, "/ws");

    const reply = nextMessage(socket);
    socket.send("not json");

    expect(await reply).toEqual({
      type: "error",
      code: "invalid_json",
      message: "Inbound socket payload is not valid JSON",
      recoverable: false,
    });
  });
});
