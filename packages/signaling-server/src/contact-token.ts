import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { SignalingError } from "./errors.js";

const IV_BYTES = 12;
const TAG_BYTES = 16;

export const ContactSchema = z.object({
  a: z.string().min(1),
  b: z.string().min(1),
});

export type Contact = z.infer<typeof ContactSchema>;

/**
 * Seals a contact into a token the client can only hand back: the pair is
 * signed as an HS256 JWT and the JWT is encrypted with AES-256-GCM. Tokens
 * carry no expiry.
 */
export class ContactTokenCodec {
  private readonly signingSecret: string;
  private readonly key: Buffer;

  constructor(signingSecret: string, encryptionSecret: string) {
    this.signingSecret = signingSecret;
    this.key = createHash("sha256").update(encryptionSecret).digest();
  }

  encode(contact: Contact): string {
    const signed = jwt.sign({ a: contact.a, b: contact.b }, this.signingSecret, {
      algorithm: "HS256",
      subject: "contact",
    });

    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv("aes-256-gcm", this.key, iv);
    const sealed = Buffer.concat([cipher.update(signed, "utf8"), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), sealed]).toString("base64url");
  }

  decode(token: string): Contact {
    const raw = Buffer.from(token, "base64url");
    if (raw.length <= IV_BYTES + TAG_BYTES) {
      throw new SignalingError("token_invalid", "Contact token is truncated");
    }

    let decoded: unknown;
    try {
      const decipher = createDecipheriv("aes-256-gcm", this.key, raw.subarray(0, IV_BYTES));
      decipher.setAuthTag(raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES));
      const signed = Buffer.concat([
        decipher.update(raw.subarray(IV_BYTES + TAG_BYTES)),
        decipher.final(),
      ]).toString("utf8");
      decoded = jwt.verify(signed, this.signingSecret, { algorithms: ["HS256"], subject: "contact" });
    } catch (error) {
      throw new SignalingError("token_invalid", "Failed to decode contact token", {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = ContactSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new SignalingError("token_invalid", "Contact token carries invalid claims");
    }
    return parsed.data;
  }
}
