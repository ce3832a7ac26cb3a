import { DEFAULT_CALL_TIMEOUT_MS, MAX_TIMER_MS } from "@ocpp-lite/protocol";
import { DEFAULT_HEARTBEAT_INTERVAL } from "./central-system.js";

export interface CentralConfig {
  host: string;
  wsPort: number;
  httpPort: number;
  /** Seconds, handed to devices in the BootNotification reply. */
  heartbeatInterval: number;
  callTimeoutMs: number;
  schemaDir: string | undefined;
  /** Where the administrative clients (CLI commands, MCP server) find the HTTP API. */
  adminUrl: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveCentralConfig(env: NodeJS.ProcessEnv = process.env): CentralConfig {
  const httpPort = readInteger(env, "OCPP_HTTP_PORT", 3000, PORT_RANGE);
  return {
    host: readString(env, "OCPP_HOST") ?? "localhost",
    wsPort: readInteger(env, "OCPP_WS_PORT", 9000, PORT_RANGE),
    httpPort,
    heartbeatInterval: readInteger(env, "OCPP_HEARTBEAT_INTERVAL", DEFAULT_HEARTBEAT_INTERVAL, {
      min: 1,
      max: Math.floor(MAX_TIMER_MS / 1000),
    }),
    callTimeoutMs: readInteger(env, "OCPP_CALL_TIMEOUT_MS", DEFAULT_CALL_TIMEOUT_MS, { min: 1, max: MAX_TIMER_MS }),
    schemaDir: readString(env, "OCPP_SCHEMA_DIR"),
    adminUrl: readString(env, "OCPP_ADMIN_URL") ?? `http://localhost:${httpPort}`,
  };
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

interface IntegerRange {
  min: number;
  max: number;
}

const PORT_RANGE: IntegerRange = { min: 1, max: 65535 };

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, range: IntegerRange): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < range.min || value > range.max) {
    throw new ConfigError(`${name} must be an integer from ${range.min} to ${range.max}, got "${raw}"`);
  }
  return value;
}
