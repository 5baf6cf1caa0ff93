import { z } from "zod";

const PeerIdSchema = z.string().min(1).max(256);

export const SessionDataSchema = z.object({
  id: z.string(),
  userid: z.string().optional(),
  ua: z.string().optional(),
  roomId: z.string(),
  status: z.string().optional(),
  presence: z.record(z.unknown()).optional(),
});

export const RelayCredentialSchema = z.object({
  username: z.string(),
  password: z.string(),
  ttl: z.number().int().nonnegative(),
  urls: z.array(z.string()),
});

export const UserTokenRequestSchema = z.object({
  userid: PeerIdSchema,
});

export const UserTokenResponseSchema = z.object({
  userid: z.string(),
  token: z.string().min(1),
  expiresAtMs: z.number().int().nonnegative(),
});

// Client -> server.

export const HelloMessageSchema = z.object({
  type: z.literal("hello"),
  roomId: PeerIdSchema,
  ua: z.string().max(512).optional(),
});

export const SelfRequestMessageSchema = z.object({
  type: z.literal("self"),
});

export const OfferMessageSchema = z.object({
  type: z.literal("offer"),
  to: PeerIdSchema,
  payload: z.unknown(),
});

export const AnswerMessageSchema = z.object({
  type: z.literal("answer"),
  to: PeerIdSchema,
  payload: z.unknown(),
});

export const CandidateMessageSchema = z.object({
  type: z.literal("candidate"),
  to: PeerIdSchema,
  payload: z.unknown(),
});

export const ByeMessageSchema = z.object({
  type: z.literal("bye"),
  to: PeerIdSchema,
  reason: z.string().max(256).optional(),
});

export const ChatMessageSchema = z.object({
  type: z.literal("chat"),
  to: PeerIdSchema.optional(),
  message: z.string().min(1).max(10_000),
});

export const StatusMessageSchema = z.object({
  type: z.literal("status"),
  status: z.record(z.unknown()),
});

export const UsersRequestMessageSchema = z.object({
  type: z.literal("users"),
});

export const ContactRequestMessageSchema = z.object({
  type: z.literal("contact.request"),
  to: PeerIdSchema,
  success: z.boolean(),
  token: z.string(),
});

export const SessionsRequestMessageSchema = z.object({
  type: z.literal("sessions"),
  token: z.string().min(1),
});

export const AliveMessageSchema = z.object({
  type: z.literal("alive"),
  alive: z.number().int().nonnegative(),
});

export const SignalingInboundSchema = z.discriminatedUnion("type", [
  HelloMessageSchema,
  SelfRequestMessageSchema,
  OfferMessageSchema,
  AnswerMessageSchema,
  CandidateMessageSchema,
  ByeMessageSchema,
  ChatMessageSchema,
  StatusMessageSchema,
  UsersRequestMessageSchema,
  ContactRequestMessageSchema,
  SessionsRequestMessageSchema,
  AliveMessageSchema,
]);

// Payloads routed between sessions inside an envelope.

export const JoinedMessageSchema = SessionDataSchema.extend({
  type: z.literal("joined"),
});

export const LeftMessageSchema = SessionDataSchema.extend({
  type: z.literal("left"),
});

export const StatusChangedMessageSchema = z.object({
  type: z.literal("status"),
  id: z.string(),
  status: z.record(z.unknown()),
});

export const RoutedPayloadSchema = z.discriminatedUnion("type", [
  JoinedMessageSchema,
  LeftMessageSchema,
  StatusChangedMessageSchema,
  OfferMessageSchema,
  AnswerMessageSchema,
  CandidateMessageSchema,
  ByeMessageSchema,
  ChatMessageSchema,
  ContactRequestMessageSchema,
]);

export const EnvelopeSchema = z.object({
  from: z.string(),
  to: z.string(),
  a: z.string(),
  data: RoutedPayloadSchema,
});

// Server -> client replies.

export const SelfMessageSchema = z.object({
  type: z.literal("self"),
  id: z.string(),
  userid: z.string().optional(),
  version: z.string(),
  token: z.string(),
  turn: RelayCredentialSchema,
});

export const WelcomeMessageSchema = z.object({
  type: z.literal("welcome"),
  roomId: z.string(),
  users: z.array(SessionDataSchema),
});

export const UsersMessageSchema = z.object({
  type: z.literal("users"),
  users: z.array(SessionDataSchema),
});

export const SessionsMessageSchema = z.object({
  type: z.literal("sessions"),
  users: z.array(SessionDataSchema),
});

export const AliveReplyMessageSchema = z.object({
  type: z.literal("alive"),
  alive: z.number().int().nonnegative(),
});

export const SignalingErrorMessageSchema = z.object({
  type: z.literal("error"),
  code: z.string(),
  message: z.string(),
  recoverable: z.boolean(),
});

export const SignalingReplySchema = z.discriminatedUnion("type", [
  SelfMessageSchema,
  WelcomeMessageSchema,
  UsersMessageSchema,
  SessionsMessageSchema,
  AliveReplyMessageSchema,
  SignalingErrorMessageSchema,
]);

export const SignalingOutboundSchema = z.union([EnvelopeSchema, SignalingReplySchema]);

export type SessionData = z.infer<typeof SessionDataSchema>;
export type RelayCredential = z.infer<typeof RelayCredentialSchema>;
export type UserTokenRequest = z.infer<typeof UserTokenRequestSchema>;
export type UserTokenResponse = z.infer<typeof UserTokenResponseSchema>;
export type HelloMessage = z.infer<typeof HelloMessageSchema>;
export type ContactRequestMessage = z.infer<typeof ContactRequestMessageSchema>;
export type SignalingInbound = z.infer<typeof SignalingInboundSchema>;
export type RoutedPayload = z.infer<typeof RoutedPayloadSchema>;
export type Envelope = z.infer<typeof EnvelopeSchema>;
export type SignalingReply = z.infer<typeof SignalingReplySchema>;
export type SignalingErrorMessage = z.infer<typeof SignalingErrorMessageSchema>;
export type SignalingOutbound = z.infer<typeof SignalingOutboundSchema>;
