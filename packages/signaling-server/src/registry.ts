import type { SessionData } from "@peerlink/signaling-contracts";
import type { FastifyBaseLogger } from "fastify";
import type { Session } from "./session.js";
import type { Client, SessionStore } from "./types.js";

export interface RegistrySnapshot {
  count: number;
  sessions?: Record<string, SessionData>;
  connections?: Record<string, string>;
}

/**
 * Live connections keyed by session id. Every method runs to completion
 * without yielding, so each call is atomic with respect to the other
 * connection handlers on the event loop.
 */
export class ConnectionRegistry implements SessionStore {
  private readonly clients = new Map<string, Client>();

  constructor(private readonly logger: FastifyBaseLogger) {}

  register(session: Session, client: Client): void {
    const existing = this.clients.get(session.id);
    // The replacement is live before the stale client is closed, so the stale
    // client's close handler no longer owns the entry.
    this.clients.set(session.id, client);
    if (existing && existing !== client) {
      this.logger.info({ sessionId: session.id, index: existing.index() }, "replacing existing client");
      existing.close(false);
      return;
    }
    this.logger.info({ sessionId: session.id, index: client.index() }, "registered client");
  }

  /**
   * Removes the entry for the session. With `client` given, only removes it
   * while that client is still the live one.
   */
  unregister(session: Session, client?: Client): boolean {
    const existing = this.clients.get(session.id);
    if (!existing || (client && existing !== client)) {
      return false;
    }
    this.clients.delete(session.id);
    return true;
  }

  lookup(id: string): Client | undefined {
    return this.clients.get(id);
  }

  getSession(id: string): Session | undefined {
    return this.clients.get(id)?.session();
  }

  sessionsByUserId(userid: string): SessionData[] {
    const sessions: SessionData[] = [];
    for (const client of this.clients.values()) {
      const session = client.session();
      if (session.userid !== "" && session.userid === userid) {
        sessions.push(session.data());
      }
    }
    return sessions;
  }

  snapshot(withDetails: boolean): RegistrySnapshot {
    const count = this.clients.size;
    if (!withDetails) {
      return { count };
    }

    const sessions: Record<string, SessionData> = {};
    const connections: Record<string, string> = {};
    for (const [id, client] of this.clients.entries()) {
      sessions[id] = client.session().data();
      connections[String(client.index())] = id;
    }
    return { count, sessions, connections };
  }
}
