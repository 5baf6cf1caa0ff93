import type { RoutedPayload } from "@peerlink/signaling-contracts";
import type { FastifyBaseLogger } from "fastify";
import { createEnvelope, type OutgoingEncoder } from "./encoder.js";
import type { ConnectionRegistry } from "./registry.js";
import type { Session } from "./session.js";
import type { RoomManager } from "./types.js";

export class MessageRouter {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly rooms: RoomManager,
    private readonly encoder: OutgoingEncoder,
    private readonly logger: FastifyBaseLogger,
  ) {}

  /** At-most-once delivery; returns false when the message was dropped. */
  unicast(from: Session, to: string, payload: RoutedPayload): boolean {
    let message: string;
    try {
      message = this.encoder.encode(createEnvelope(from, to, payload));
    } catch (error) {
      this.logger.error({ err: error, from: from.id, to }, "failed to encode outgoing message");
      return false;
    }

    const client = this.registry.lookup(to);
    if (!client) {
      this.logger.warn({ from: from.id, to, type: payload.type }, "unicast target not found");
      return false;
    }
    client.send(message);
    return true;
  }

  broadcast(from: Session, payload: RoutedPayload): void {
    this.rooms.broadcast(from, payload);
  }
}
