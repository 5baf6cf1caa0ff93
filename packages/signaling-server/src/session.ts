import type { SessionData } from "@peerlink/signaling-contracts";

export type LeaveStatus = "soft" | "hard";

/**
 * Server-side state of one connected party. `roomid` is empty while the
 * session is not in a room; `status` carries the leave marker while a leave
 * is being announced.
 */
export class Session {
  readonly id: string;
  readonly attestation: string;
  userid: string;
  roomid = "";
  status: "" | LeaveStatus = "";
  ua = "";
  presence?: Record<string, unknown>;

  constructor(id: string, attestation: string, userid = "") {
    this.id = id;
    this.attestation = attestation;
    this.userid = userid;
  }

  data(): SessionData {
    return {
      id: this.id,
      userid: this.userid || undefined,
      ua: this.ua || undefined,
      roomId: this.roomid,
      status: this.status || undefined,
      presence: this.presence,
    };
  }
}
