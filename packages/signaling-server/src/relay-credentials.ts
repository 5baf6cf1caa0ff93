import { createHash, createHmac } from "node:crypto";
import type { RelayCredential } from "@peerlink/signaling-contracts";
import type { Session } from "./session.js";

export interface RelayCredentialOptions {
  secret: string;
  ttlSec: number;
  urls: string[];
  nowMs?: () => number;
}

/**
 * Shared-secret credentials for a TURN server running the REST auth scheme
 * (coturn `static-auth-secret`). The relay recomputes the HMAC on its own, so
 * nothing is stored here.
 */
export class RelayCredentialIssuer {
  private readonly secret: string;
  private readonly ttlSec: number;
  private readonly urls: string[];
  private readonly nowMs: () => number;

  constructor(options: RelayCredentialOptions) {
    this.secret = options.secret;
    this.ttlSec = options.ttlSec;
    this.urls = options.urls;
    this.nowMs = options.nowMs ?? Date.now;
  }

  get enabled(): boolean {
    return this.secret.length > 0;
  }

  issue(session: Pick<Session, "id">): RelayCredential {
    if (!this.enabled) {
      return { username: "", password: "", ttl: 0, urls: [] };
    }

    const hashedId = createHash("sha256").update(session.id).digest("base64");
    const expiration = Math.floor(this.nowMs() / 1000) + this.ttlSec;
    const username = `${expiration}:${hashedId}`;
    const password = createHmac("sha1", this.secret).update(username).digest("base64");

    return { username, password, ttl: this.ttlSec, urls: [...this.urls] };
  }
}
