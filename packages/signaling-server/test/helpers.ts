import {
  EnvelopeSchema,
  type Envelope,
  type RoutedPayload,
  type SessionData,
  type SignalingReply,
} from "@peerlink/signaling-contracts";
import Fastify, { type FastifyBaseLogger } from "fastify";
import type { AppConfig } from "../src/config.js";
import { SignalingError } from "../src/errors.js";
import type { Session } from "../src/session.js";
import type { Client, RoomManager, Sender } from "../src/types.js";

export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: { level: "silent" } }).log;
}

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    logLevel: "silent",
    logPretty: false,
    serverVersion: "0.0.0+tests",
    controlAuthToken: "secret-token",
    sessionSecret: "test-session-secret",
    encryptionSecret: "test-encryption-secret",
    turnSecret: "",
    turnUris: [],
    turnTtlSec: 3600,
    userTokenTtlSec: 900,
    maxBroadcastPerSecond: 1000,
    maxRoomUsers: 5000,
    userTokensPerMinutePerIp: 120,
    ...overrides,
  };
}

export class FakeClient implements Client {
  readonly sent: string[] = [];
  readonly replies: SignalingReply[] = [];
  readonly closes: boolean[] = [];
  private readonly owner: Session;
  private readonly slot: number;

  constructor(owner: Session, slot = 1) {
    this.owner = owner;
    this.slot = slot;
  }

  send(message: string): void {
    this.sent.push(message);
  }

  reply(message: SignalingReply): void {
    this.replies.push(message);
  }

  session(): Session {
    return this.owner;
  }

  close(graceful: boolean): void {
    this.closes.push(graceful);
  }

  index(): number {
    return this.slot;
  }

  envelopes(): Envelope[] {
    return this.sent.map((message) => EnvelopeSchema.parse(JSON.parse(message)));
  }
}

export class FakeRoomManager implements RoomManager {
  disallowJoin = false;
  joinedId = "";
  leftId = "";
  users: SessionData[] = [];
  broadcasts: RoutedPayload[] = [];

  canJoinRoom(_roomId: string, _session: Session): boolean {
    return !this.disallowJoin;
  }

  roomUsers(_session: Session): SessionData[] {
    return this.users;
  }

  joinRoom(session: Session, _sender: Sender): void {
    this.joinedId = session.roomid;
  }

  leaveRoom(session: Session): void {
    this.leftId = session.roomid;
  }

  broadcast(_session: Session, payload: RoutedPayload): void {
    this.broadcasts.push(payload);
  }
}

export function captureSignalingError(fn: () => unknown): SignalingError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SignalingError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a SignalingError to be thrown");
}
