import type { SignalingErrorMessage } from "@peerlink/signaling-contracts";

export type SignalingErrorCode =
  | "token_invalid"
  | "missing_identity"
  | "peer_not_found"
  | "contact_mismatch"
  | "self_contact"
  | "join_denied"
  | "rate_limited";

export class SignalingError extends Error {
  readonly code: SignalingErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SignalingErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "SignalingError";
    this.code = code;
    this.context = context;
  }

  toMessage(): SignalingErrorMessage {
    return {
      type: "error",
      code: this.code,
      message: this.message,
      recoverable: true,
    };
  }
}
