import { isIP } from "node:net";
import { ConfigError } from "../errors.js";
import type { RequestDefaults } from "../types/request.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EnvConfig {
  logLevel: LogLevel;
  defaults: RequestDefaults;
}

export const FIXED_DEFAULTS: RequestDefaults = {
  serverName: "localhost",
  serverPort: 80,
  remoteAddr: "127.0.0.1",
  remotePort: 80,
  localAddr: "127.0.0.1",
  localPort: 80,
  localHostname: "localhost"
};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsePositiveInt = (raw: string | undefined, name: string, fallback: number) => {
    const n = Number(raw ?? String(fallback));
    if (!Number.isInteger(n) || n <= 0) {
      throw new ConfigError(`${name} must be a positive integer`);
    }
    return n;
  };

  const logLevelRaw = (env.REQUEST_FORGE_LOG_LEVEL ?? "silent").toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new ConfigError(`REQUEST_FORGE_LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }

  const serverName = env.REQUEST_FORGE_SERVER_NAME || "localhost";
  const serverPort = parsePositiveInt(env.REQUEST_FORGE_SERVER_PORT, "REQUEST_FORGE_SERVER_PORT", 80);

  const remoteAddr = (env.REQUEST_FORGE_REMOTE_ADDR ?? "").trim() || "127.0.0.1";
  if (isIP(remoteAddr) === 0) {
    throw new ConfigError("REQUEST_FORGE_REMOTE_ADDR must be an IPv4 or IPv6 address");
  }

  return {
    logLevel: logLevelRaw,
    defaults: { ...FIXED_DEFAULTS, serverName, serverPort, remoteAddr }
  };
}
