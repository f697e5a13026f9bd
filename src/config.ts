import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface Config {
  server: {
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  rateLimit: {
    rpm: number;
  };
  ledger: {
    fallbackCategory: string;
    forecastHorizon: number;
    recentLimit: number;
  };
  dbPath: string;
  logLevel: LogLevel;
}

let current: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = process.argv): Config {
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("LOG_LEVEL", logLevel);
  }

  current = {
    server: {
      port: positiveInt(env, "PORT", 3200),
      transport: resolveTransport(env, argv),
      corsOrigins: (env.CORS_ORIGINS || "*")
        .split(",")
        .map((o) => o.trim())
        .filter(Boolean),
    },
    rateLimit: {
      rpm: positiveInt(env, "RATE_LIMIT_RPM", 60),
    },
    ledger: {
      fallbackCategory: (env.FALLBACK_CATEGORY || "Others").trim(),
      forecastHorizon: positiveInt(env, "FORECAST_HORIZON", 3),
      recentLimit: positiveInt(env, "RECENT_LIMIT", 50),
    },
    dbPath: env.DB_PATH || "pocket-pilot.db",
    logLevel,
  };
  return current;
}

/** The configuration loaded at startup, or defaults when none was loaded. */
export function getConfig(): Config {
  return current ?? loadConfig({}, []);
}

function resolveTransport(env: NodeJS.ProcessEnv, argv: string[]): "stdio" | "http" {
  // CLI flag takes precedence
  const args = argv.slice(2);
  const transportIdx = args.indexOf("--transport");
  if (transportIdx !== -1 && args[transportIdx + 1]) {
    const val = args[transportIdx + 1];
    if (val === "stdio" || val === "http") return val;
  }

  // Then env var
  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  // Default
  return "stdio";
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(key, raw);
  }
  return value;
}
