export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  logPretty: boolean;
  serverVersion: string;
  controlAuthToken: string;
  sessionSecret: string;
  encryptionSecret: string;
  turnSecret: string;
  turnUris: string[];
  turnTtlSec: number;
  userTokenTtlSec: number;
  maxBroadcastPerSecond: number;
  maxRoomUsers: number;
  userTokensPerMinutePerIp: number;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function listEnv(name: string): string[] {
  return (process.env[name] ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function loadConfig(): AppConfig {
  return {
    port: numberEnv("PORT", 8080),
    host: process.env.HOST ?? "0.0.0.0",
    logLevel: process.env.LOG_LEVEL ?? "info",
    logPretty: process.env.NODE_ENV === "development",
    serverVersion: process.env.SERVER_VERSION ?? "0.1.0",
    controlAuthToken: required("CONTROL_AUTH_TOKEN"),
    sessionSecret: required("SESSION_SECRET"),
    encryptionSecret: required("ENCRYPTION_SECRET"),
    turnSecret: process.env.TURN_SECRET ?? "",
    turnUris: listEnv("TURN_URIS"),
    turnTtlSec: numberEnv("TURN_TTL_SEC", 3600),
    userTokenTtlSec: numberEnv("USER_TOKEN_TTL_SEC", 86_400),
    maxBroadcastPerSecond: numberEnv("MAX_BROADCAST_PER_SECOND", 1000),
    maxRoomUsers: numberEnv("MAX_ROOM_USERS", 5000),
    userTokensPerMinutePerIp: numberEnv("USER_TOKENS_PER_MINUTE_PER_IP", 120),
  };
}
