import { homedir } from "node:os";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface GatewayConfig {
  /** DuckDB file the gateway opens. */
  databasePath: string;
  /** The one path that is seeded with sample data when it does not exist yet. */
  bootstrapPath: string;
  /** Wall-clock limit per statement, in milliseconds. */
  queryTimeout: number;
  /** Row cap for formatted tool output. */
  maxRows: number;
  logLevel: LogLevel;
}

export const BOOTSTRAP_DATABASE = "test_sample_db.duckdb";

const MAX_ROWS_CAP = 10_000;

const DEFAULTS: GatewayConfig = {
  databasePath: BOOTSTRAP_DATABASE,
  bootstrapPath: BOOTSTRAP_DATABASE,
  queryTimeout: 60_000,
  maxRows: 1000,
  logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export function resolveConfig(
  raw?: Partial<GatewayConfig>,
  env: NodeJS.ProcessEnv = process.env,
): GatewayConfig {
  const databasePath = raw?.databasePath ?? env.DUCKDB_GATEWAY_DB ?? DEFAULTS.databasePath;
  const bootstrapPath = raw?.bootstrapPath ?? DEFAULTS.bootstrapPath;
  const queryTimeout = raw?.queryTimeout ?? parseTimeout(env.DUCKDB_GATEWAY_TIMEOUT) ?? DEFAULTS.queryTimeout;
  const logLevel = raw?.logLevel ?? parseLogLevel(env.LOG_LEVEL) ?? DEFAULTS.logLevel;

  if (!Number.isFinite(queryTimeout) || queryTimeout <= 0) {
    throw new Error(`queryTimeout must be a positive number of milliseconds, got ${queryTimeout}`);
  }

  return {
    // the bootstrap identifier is matched verbatim, so it is never expanded
    databasePath: databasePath === bootstrapPath ? databasePath : resolvePath(databasePath, env),
    bootstrapPath,
    queryTimeout,
    maxRows: Math.min(raw?.maxRows ?? DEFAULTS.maxRows, MAX_ROWS_CAP),
    logLevel,
  };
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`DUCKDB_GATEWAY_TIMEOUT must be a number of milliseconds, got "${value}"`);
  }
  return parsed;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const lowered = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === lowered);
}

/**
 * Expand $ENV_VAR references in a string to their process.env values.
 * Throws if the variable is not set.
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_match, name: string) => {
    const val = env[name];
    if (val === undefined) {
      throw new Error(`Environment variable $${name} is not set. Set it before connecting.`);
    }
    return val;
  });
}

/**
 * Resolve a path, expanding ~ to home directory and $ENV_VAR references.
 */
export function resolvePath(p: string, env: NodeJS.ProcessEnv = process.env): string {
  let resolved = expandEnv(p, env);
  if (resolved.startsWith("~/")) {
    resolved = resolved.replace("~", env.HOME ?? homedir());
  }
  return resolved;
}
