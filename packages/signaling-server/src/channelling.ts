import type { HelloMessage, SignalingInbound } from "@peerlink/signaling-contracts";
import type { FastifyBaseLogger } from "fastify";
import type { ContactManager } from "./contacts.js";
import { SignalingError } from "./errors.js";
import type { FixedWindowRateLimiter } from "./rate-limit.js";
import type { ConnectionRegistry } from "./registry.js";
import type { RelayCredentialIssuer } from "./relay-credentials.js";
import type { MessageRouter } from "./router.js";
import type { LeaveStatus, Session } from "./session.js";
import type { Client, RoomManager } from "./types.js";

export interface ChannellingDeps {
  version: string;
  registry: ConnectionRegistry;
  router: MessageRouter;
  rooms: RoomManager;
  relayCredentials: RelayCredentialIssuer;
  contacts: ContactManager;
  broadcastLimiter: FixedWindowRateLimiter;
  mintSessionToken: (session: Session) => string;
  logger: FastifyBaseLogger;
}

/**
 * Interprets inbound signaling messages for one server. Room membership
 * moves Unjoined -> Joined(room) on hello, Joined(a) -> Joined(b) through a
 * soft leave, and back to Unjoined with a hard leave on disconnect.
 */
export class ChannellingApi {
  private readonly version: string;
  private readonly registry: ConnectionRegistry;
  private readonly router: MessageRouter;
  private readonly rooms: RoomManager;
  private readonly relayCredentials: RelayCredentialIssuer;
  private readonly contacts: ContactManager;
  private readonly broadcastLimiter: FixedWindowRateLimiter;
  private readonly mintSessionToken: (session: Session) => string;
  private readonly logger: FastifyBaseLogger;

  constructor(deps: ChannellingDeps) {
    this.version = deps.version;
    this.registry = deps.registry;
    this.router = deps.router;
    this.rooms = deps.rooms;
    this.relayCredentials = deps.relayCredentials;
    this.contacts = deps.contacts;
    this.broadcastLimiter = deps.broadcastLimiter;
    this.mintSessionToken = deps.mintSessionToken;
    this.logger = deps.logger;
  }

  onConnect(client: Client): void {
    this.registry.register(client.session(), client);
  }

  onDisconnect(client: Client): void {
    const session = client.session();
    if (!this.registry.unregister(session, client)) {
      this.leaveReplacedSession(session);
      return;
    }
    this.broadcastLimiter.forget(session.id);
    if (session.roomid !== "") {
      this.leaveRoom(session, "hard");
    }
    this.logger.info({ sessionId: session.id }, "client disconnected");
  }

  onIncoming(client: Client, message: SignalingInbound): void {
    const session = client.session();
    try {
      this.dispatch(client, session, message);
    } catch (error) {
      if (!(error instanceof SignalingError)) {
        throw error;
      }
      this.logger.debug({ sessionId: session.id, code: error.code, context: error.context }, error.message);
      client.reply(error.toMessage());
    }
  }

  private dispatch(client: Client, session: Session, message: SignalingInbound): void {
    switch (message.type) {
      case "hello":
        this.hello(client, session, message);
        return;
      case "self":
        client.reply({
          type: "self",
          id: session.id,
          userid: session.userid || undefined,
          version: this.version,
          token: this.mintSessionToken(session),
          turn: this.relayCredentials.issue(session),
        });
        return;
      case "offer":
      case "answer":
      case "candidate":
      case "bye":
        this.router.unicast(session, message.to, message);
        return;
      case "chat":
        if (message.to) {
          this.router.unicast(session, message.to, message);
          return;
        }
        this.assertBroadcastAllowed(session);
        this.router.broadcast(session, message);
        return;
      case "status":
        this.assertBroadcastAllowed(session);
        session.presence = message.status;
        this.router.broadcast(session, { type: "status", id: session.id, status: message.status });
        return;
      case "users":
        client.reply({ type: "users", users: this.rooms.roomUsers(session) });
        return;
      case "contact.request":
        this.router.unicast(session, message.to, this.contacts.handleRequest(session, message));
        return;
      case "sessions": {
        const userid = this.contacts.contactUserId(session, message.token);
        client.reply({ type: "sessions", users: this.registry.sessionsByUserId(userid) });
        return;
      }
      case "alive":
        client.reply({ type: "alive", alive: message.alive });
        return;
    }
  }

  private hello(client: Client, session: Session, hello: HelloMessage): void {
    if (!this.rooms.canJoinRoom(hello.roomId, session)) {
      throw new SignalingError("join_denied", "Joining this room is not permitted", { roomId: hello.roomId });
    }

    if (session.roomid !== "" && session.roomid !== hello.roomId) {
      this.leaveRoom(session, "soft");
    }

    session.roomid = hello.roomId;
    session.ua = hello.ua ?? "";
    session.status = "";
    this.rooms.joinRoom(session, client);
    this.router.broadcast(session, { type: "joined", ...session.data() });

    client.reply({ type: "welcome", roomId: session.roomid, users: this.rooms.roomUsers(session) });
  }

  /** Announces the leave to the old room before membership is cleared. */
  private leaveRoom(session: Session, status: LeaveStatus): void {
    session.status = status;
    this.rooms.leaveRoom(session);
    this.router.broadcast(session, { type: "left", ...session.data() });
    session.roomid = "";
    session.status = "";
  }

  /**
   * A resumed session starts unjoined, so the replaced one still holds its
   * room. Once the resumed session has joined that same room the slot is
   * already taken over and no leave is announced.
   */
  private leaveReplacedSession(session: Session): void {
    if (session.roomid === "") {
      return;
    }
    const live = this.registry.getSession(session.id);
    if (live === session) {
      return;
    }
    if (live?.roomid === session.roomid) {
      session.roomid = "";
      return;
    }
    this.leaveRoom(session, "hard");
    this.logger.info({ sessionId: session.id }, "replaced client left its room");
  }

  private assertBroadcastAllowed(session: Session): void {
    if (!this.broadcastLimiter.allow(session.id)) {
      throw new SignalingError("rate_limited", "Too many broadcasts", { sessionId: session.id });
    }
  }
}
