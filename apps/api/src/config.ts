// apps/api/src/config.ts

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent"
];

export interface AppConfig {
  port: number;
  host: string;
  dbPath: string;
  logLevel: LogLevel;
  /**
   * Admin bootstrap toggle. Off: any membership row makes a caller an admin.
   * On: a membership with role "Admin" is required.
   */
  requireAdminRole: boolean;
  /** Empty list reflects the request origin. */
  corsOrigins: string[];
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

function parsePort(raw: string | undefined): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 && n < 65536 ? n : 4000;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    host: env.HOST || "0.0.0.0",
    dbPath: env.SLOTSWAP_DB_PATH || "./slot-swap.db",
    logLevel: parseLogLevel(env.LOG_LEVEL),
    requireAdminRole: (env.REQUIRE_ADMIN_ROLE ?? "").trim().toLowerCase() === "true",
    corsOrigins: (env.CORS_ORIGINS ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  };
}
