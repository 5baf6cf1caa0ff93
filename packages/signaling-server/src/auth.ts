import jwt, { type JwtPayload } from "jsonwebtoken";

export interface UserClaims {
  userid: string;
}

export interface SessionClaims {
  sid: string;
  userid?: string;
}

export function assertControlAuth(headerValue: string | undefined, expectedToken: string): void {
  const [scheme, token] = (headerValue ?? "").split(" ");
  if (scheme !== "Bearer" || token !== expectedToken) {
    throw new Error("Unauthorized");
  }
}

function verifyClaims(token: string, secret: string, subject: string): JwtPayload {
  const decoded = jwt.verify(token, secret, { algorithms: ["HS256"], subject });
  if (typeof decoded !== "object" || decoded === null) {
    throw new Error(`Invalid ${subject} token`);
  }
  return decoded;
}

export function mintUserToken(claims: UserClaims, secret: string, expiresInSec: number): string {
  return jwt.sign(claims, secret, {
    algorithm: "HS256",
    subject: "user",
    expiresIn: expiresInSec,
  });
}

export function verifyUserToken(token: string, secret: string): UserClaims {
  const userid = verifyClaims(token, secret, "user")["userid"];
  if (typeof userid !== "string" || userid.length === 0) {
    throw new Error("Invalid user claims");
  }
  return { userid };
}

/** Lets a reconnecting client reclaim its previous session id. */
export function mintSessionToken(claims: SessionClaims, secret: string, expiresInSec: number): string {
  return jwt.sign(claims, secret, {
    algorithm: "HS256",
    subject: "session",
    expiresIn: expiresInSec,
  });
}

export function verifySessionToken(token: string, secret: string): SessionClaims {
  const decoded = verifyClaims(token, secret, "session");
  const sid = decoded["sid"];
  const userid = decoded["userid"];
  if (typeof sid !== "string" || sid.length === 0) {
    throw new Error("Invalid session claims");
  }
  if (userid !== undefined && typeof userid !== "string") {
    throw new Error("Invalid session claims");
  }
  return { sid, userid };
}

/**
 * Opaque per-session token attached to every envelope the session sends, so
 * receivers can hand it back to the server to prove where the data came from.
 */
export function mintAttestation(sessionId: string, secret: string): string {
  return jwt.sign({ sid: sessionId }, secret, {
    algorithm: "HS256",
    subject: "attestation",
    noTimestamp: true,
  });
}
