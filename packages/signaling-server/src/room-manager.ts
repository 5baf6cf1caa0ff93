import type { RoutedPayload, SessionData } from "@peerlink/signaling-contracts";
import type { FastifyBaseLogger } from "fastify";
import { createEnvelope, type OutgoingEncoder } from "./encoder.js";
import type { Session } from "./session.js";
import type { RoomManager, Sender } from "./types.js";

interface RoomMember {
  session: Session;
  sender: Sender;
}

export interface RoomStats {
  rooms: number;
  members: number;
}

export class InMemoryRoomManager implements RoomManager {
  private readonly rooms = new Map<string, Map<string, RoomMember>>();

  constructor(
    private readonly encoder: OutgoingEncoder,
    private readonly maxRoomUsers: number,
    private readonly logger: FastifyBaseLogger,
  ) {}

  /** A session already holding a slot in the room may always rejoin it. */
  canJoinRoom(roomId: string, session: Session): boolean {
    const room = this.rooms.get(roomId);
    return !room || room.size < this.maxRoomUsers || room.get(session.id)?.session === session;
  }

  roomUsers(session: Session): SessionData[] {
    const room = this.rooms.get(session.roomid);
    if (!room) {
      return [];
    }
    const users: SessionData[] = [];
    for (const [id, member] of room.entries()) {
      if (id !== session.id) {
        users.push(member.session.data());
      }
    }
    return users;
  }

  joinRoom(session: Session, sender: Sender): void {
    let room = this.rooms.get(session.roomid);
    if (!room) {
      room = new Map();
      this.rooms.set(session.roomid, room);
    }
    room.set(session.id, { session, sender });
  }

  leaveRoom(session: Session): void {
    const room = this.rooms.get(session.roomid);
    if (!room) {
      return;
    }
    // A resumed session may already own this slot under the same id.
    if (room.get(session.id)?.session === session) {
      room.delete(session.id);
    }
    if (room.size === 0) {
      this.rooms.delete(session.roomid);
    }
  }

  broadcast(session: Session, payload: RoutedPayload): void {
    const room = this.rooms.get(session.roomid);
    if (!room) {
      return;
    }

    let message: string;
    try {
      message = this.encoder.encode(createEnvelope(session, "", payload));
    } catch (error) {
      this.logger.error({ err: error, from: session.id, roomId: session.roomid }, "failed to encode broadcast");
      return;
    }

    for (const [id, member] of room.entries()) {
      if (id !== session.id) {
        member.sender.send(message);
      }
    }
  }

  stats(): RoomStats {
    let members = 0;
    for (const room of this.rooms.values()) {
      members += room.size;
    }
    return { rooms: this.rooms.size, members };
  }
}
