import type { ContactRequestMessage } from "@peerlink/signaling-contracts";
import type { ContactTokenCodec } from "./contact-token.js";
import { SignalingError } from "./errors.js";
import type { Session } from "./session.js";
import type { SessionStore } from "./types.js";

export class ContactManager {
  constructor(
    private readonly sessions: SessionStore,
    private readonly codec: ContactTokenCodec,
  ) {}

  /**
   * Runs one step of the request/confirm/deny exchange and returns the
   * message to relay to `request.to`.
   *
   * - new request (`success` false, empty token): mints a token for the pair
   * - confirm (`success` true): checks the token names exactly these two users
   * - deny (`success` false, token set): clears the token
   */
  handleRequest(session: Session, request: ContactRequestMessage): ContactRequestMessage {
    if (request.success) {
      this.confirm(session, request);
      return request;
    }
    if (request.token !== "") {
      return { ...request, token: "" };
    }
    return { ...request, token: this.create(session, request.to) };
  }

  /** Resolves the user id on the other side of a contact token. */
  contactUserId(session: Session, token: string): string {
    const contact = this.codec.decode(token);
    if (session.userid !== "" && contact.a === session.userid) {
      return contact.b;
    }
    if (session.userid !== "" && contact.b === session.userid) {
      return contact.a;
    }
    throw new SignalingError("contact_mismatch", "Contact token belongs to other users", {
      sessionId: session.id,
    });
  }

  private create(session: Session, to: string): string {
    const ownUserId = session.userid;
    if (ownUserId === "") {
      throw new SignalingError("missing_identity", "Contact requests need a user id", { sessionId: session.id });
    }
    const peer = this.peerSession(to);
    if (peer.userid === "") {
      throw new SignalingError("missing_identity", "Contact target has no user id", { to });
    }
    if (peer.userid === ownUserId) {
      throw new SignalingError("self_contact", "Cannot add yourself as a contact", { to });
    }
    return this.codec.encode({ a: peer.userid, b: ownUserId });
  }

  private confirm(session: Session, request: ContactRequestMessage): void {
    const contact = this.codec.decode(request.token);
    const ownUserId = session.userid;
    if (ownUserId === "") {
      throw new SignalingError("missing_identity", "Contact confirmations need a user id", { sessionId: session.id });
    }
    const peer = this.peerSession(request.to);
    if (peer.userid === "") {
      throw new SignalingError("missing_identity", "Contact target has no user id", { to: request.to });
    }
    if (ownUserId !== contact.a) {
      throw new SignalingError("contact_mismatch", "Contact mismatch in a", { to: request.to });
    }
    if (peer.userid !== contact.b) {
      throw new SignalingError("contact_mismatch", "Contact mismatch in b", { to: request.to });
    }
  }

  private peerSession(to: string): Session {
    const peer = this.sessions.getSession(to);
    if (!peer) {
      throw new SignalingError("peer_not_found", "Contact target is not connected", { to });
    }
    return peer;
  }
}
