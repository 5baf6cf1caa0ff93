import type { SignalingReply } from "@peerlink/signaling-contracts";
import type { RawData, WebSocket } from "ws";
import type { Session } from "./session.js";
import type { Client } from "./types.js";

/** Binds one WebSocket connection to its session. */
export class WebSocketClient implements Client {
  private readonly socket: WebSocket;
  private readonly owner: Session;
  private readonly slot: number;

  constructor(socket: WebSocket, owner: Session, slot: number) {
    this.socket = socket;
    this.owner = owner;
    this.slot = slot;
  }

  send(message: string): void {
    if (this.socket.readyState === this.socket.OPEN) {
      this.socket.send(message);
    }
  }

  reply(message: SignalingReply): void {
    this.send(JSON.stringify(message));
  }

  session(): Session {
    return this.owner;
  }

  close(graceful: boolean): void {
    if (graceful) {
      this.socket.close(1000, "bye");
      return;
    }
    this.socket.terminate();
  }

  index(): number {
    return this.slot;
  }
}

export function decodeFrame(raw: RawData): string {
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return raw.toString("utf8");
}
