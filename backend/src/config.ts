import type { AdminCapability } from "./realtime/chatGateway";
import { resolvePostgresSettingsFromEnv, type PostgresSettings } from "./repositories/postgresCore";

export type ServerConfig = Readonly<{
  port: number;
  jwtSecret: string;
  postgres: PostgresSettings | null;
  requireDatabase: boolean;
  dataDir: string;
  corsAllowedOrigins: string;
  chat: Readonly<{
    maxMessageLength: number;
    replayLimit: number;
    adminCapability: AdminCapability;
    sendTimeoutMs: number;
    heartbeatTimeoutMs: number;
  }>;
}>;

const DEFAULT_CORS_ALLOWED_ORIGINS = "http://localhost,http://127.0.0.1";

function positiveInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (typeof raw !== "string" || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer.`);
  }
  return n;
}

function adminCapabilityFrom(raw: string | undefined): AdminCapability {
  if (typeof raw !== "string" || raw.trim() === "") return "observe";
  const value = raw.trim().toLowerCase();
  if (value === "observe" || value === "participate") return value;
  throw new Error("CHAT_ADMIN_CAPABILITY must be observe or participate.");
}

export function resolveServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const jwtSecret = env.JWT_SECRET;
  if (typeof jwtSecret !== "string" || jwtSecret.trim() === "") {
    throw new Error("Missing JWT_SECRET environment variable.");
  }

  const postgres = resolvePostgresSettingsFromEnv(env);
  const requireDatabase = env.REQUIRE_DATABASE === "true";
  if (requireDatabase && !postgres) {
    throw new Error("REQUIRE_DATABASE is true but DATABASE_URL is not set.");
  }

  return {
    port: positiveInteger(env, "PORT", 3000),
    jwtSecret,
    postgres,
    requireDatabase,
    dataDir: typeof env.DATA_DIR === "string" && env.DATA_DIR.trim() !== "" ? env.DATA_DIR.trim() : "backend/.data",
    corsAllowedOrigins: env.CORS_ALLOWED_ORIGINS ?? DEFAULT_CORS_ALLOWED_ORIGINS,
    chat: {
      maxMessageLength: positiveInteger(env, "CHAT_MAX_MESSAGE_LENGTH", 2_000),
      replayLimit: positiveInteger(env, "CHAT_REPLAY_LIMIT", 50),
      adminCapability: adminCapabilityFrom(env.CHAT_ADMIN_CAPABILITY),
      sendTimeoutMs: positiveInteger(env, "CHAT_SEND_TIMEOUT_MS", 10_000),
      heartbeatTimeoutMs: positiveInteger(env, "CHAT_HEARTBEAT_TIMEOUT_MS", 45_000)
    }
  };
}
