import type { RoutedPayload, SessionData, SignalingReply } from "@peerlink/signaling-contracts";
import type { Session } from "./session.js";

export interface Sender {
  send(message: string): void;
}

/** Capabilities a transport connection exposes to the signaling core. */
export interface Client extends Sender {
  reply(message: SignalingReply): void;
  session(): Session;
  close(graceful: boolean): void;
  index(): number;
}

export interface SessionStore {
  getSession(id: string): Session | undefined;
}

export interface RoomManager {
  canJoinRoom(roomId: string, session: Session): boolean;
  roomUsers(session: Session): SessionData[];
  joinRoom(session: Session, sender: Sender): void;
  leaveRoom(session: Session): void;
  broadcast(session: Session, payload: RoutedPayload): void;
}
