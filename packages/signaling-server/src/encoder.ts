import type { Envelope, RoutedPayload } from "@peerlink/signaling-contracts";
import type { Session } from "./session.js";

export interface OutgoingEncoder {
  encode(envelope: Readonly<Envelope>): string;
}

export class JsonOutgoingEncoder implements OutgoingEncoder {
  encode(envelope: Readonly<Envelope>): string {
    return JSON.stringify(envelope);
  }
}

export function createEnvelope(from: Session, to: string, data: RoutedPayload): Readonly<Envelope> {
  return Object.freeze({
    from: from.id,
    to,
    a: from.attestation,
    data,
  });
}
