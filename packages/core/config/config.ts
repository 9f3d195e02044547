/**
 * Client configuration: defaults, then `config.json`, then HUBPAIR_* environment variables.
 */
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CHALLENGE_TIMEOUT_MS, VERDICT_TIMEOUT_MS } from "../auth/types";
import { ConfigError, errorMessage } from "../errors";
import { isLogLevel, type LogLevel } from "../logger";
import { CONNECT_TIMEOUT_MS, DEFAULT_DIRECT_URLS } from "../network/constants";
import { PAIRING_TIMEOUT_MS } from "../pairing/types";

export interface HubPairConfig {
  directUrls: string[];
  relayUrl?: string;
  relayCode?: string;
  sessionFile: string;
  connectTimeoutMs: number;
  challengeTimeoutMs: number;
  verdictTimeoutMs: number;
  pairingTimeoutMs: number;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

const TIMEOUT_KEYS = ["connectTimeoutMs", "challengeTimeoutMs", "verdictTimeoutMs", "pairingTimeoutMs"] as const;

export function defaultConfigDir(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(base, "hubpair");
}

export function defaultConfig(env: Env = process.env): HubPairConfig {
  return {
    directUrls: [...DEFAULT_DIRECT_URLS],
    sessionFile: path.join(defaultConfigDir(env), "sessions.json"),
    connectTimeoutMs: CONNECT_TIMEOUT_MS,
    challengeTimeoutMs: CHALLENGE_TIMEOUT_MS,
    verdictTimeoutMs: VERDICT_TIMEOUT_MS,
    pairingTimeoutMs: PAIRING_TIMEOUT_MS,
    logLevel: "info",
  };
}

/**
 * A missing default config file means defaults; a missing file named
 * explicitly, or one that does not parse, is a ConfigError.
 */
export async function loadConfig(options: { path?: string; env?: Env } = {}): Promise<HubPairConfig> {
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.path ?? path.join(defaultConfigDir(env), "config.json"));
  const config = defaultConfig(env);

  const fileValues = await readConfigFile(configPath, options.path !== undefined);
  if (fileValues) applyFile(config, fileValues, path.dirname(configPath));
  applyEnv(config, env);
  return config;
}

async function readConfigFile(configPath: string, required: boolean): Promise<Record<string, unknown> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (err) {
    if (!required && err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(err)}`, err);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config ${configPath} is not valid JSON`, err);
  }
  if (!isRecord(parsed)) throw new ConfigError(`Config ${configPath} must be a JSON object`);
  return parsed;
}

function applyFile(config: HubPairConfig, values: Record<string, unknown>, baseDir: string) {
  const { directUrls, relayUrl, relayCode, sessionFile, logLevel } = values;
  if (directUrls !== undefined) {
    const list = typeof directUrls === "string" ? splitAndClean(directUrls) : directUrls;
    if (!Array.isArray(list) || !list.every((v): v is string => typeof v === "string")) {
      throw new ConfigError("directUrls must be a list of URLs");
    }
    config.directUrls = list.map((url) => checkUrl(url, "directUrls", ["ws:", "wss:"]));
  }
  if (relayUrl !== undefined) config.relayUrl = checkUrl(expectString(relayUrl, "relayUrl"), "relayUrl", RELAY_SCHEMES);
  if (relayCode !== undefined) config.relayCode = expectString(relayCode, "relayCode");
  if (sessionFile !== undefined) config.sessionFile = resolvePath(expectString(sessionFile, "sessionFile"), baseDir);
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) throw new ConfigError(`Unknown logLevel ${String(logLevel)}`);
    config.logLevel = logLevel;
  }
  for (const key of TIMEOUT_KEYS) {
    const value = values[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`${key} must be a positive number of milliseconds`);
    }
    config[key] = value;
  }
}

const RELAY_SCHEMES = ["http:", "https:", "ws:", "wss:"];

function applyEnv(config: HubPairConfig, env: Env) {
  if (env.HUBPAIR_WS) {
    config.directUrls = splitAndClean(env.HUBPAIR_WS).map((url) => checkUrl(url, "HUBPAIR_WS", ["ws:", "wss:"]));
  }
  if (env.HUBPAIR_RELAY_URL) config.relayUrl = checkUrl(env.HUBPAIR_RELAY_URL.trim(), "HUBPAIR_RELAY_URL", RELAY_SCHEMES);
  if (env.HUBPAIR_RELAY_CODE) config.relayCode = env.HUBPAIR_RELAY_CODE.trim();
  if (env.HUBPAIR_SESSION_FILE) config.sessionFile = resolvePath(env.HUBPAIR_SESSION_FILE.trim(), process.cwd());
  if (env.HUBPAIR_LOG_LEVEL) {
    const level = env.HUBPAIR_LOG_LEVEL.trim().toLowerCase();
    if (!isLogLevel(level)) throw new ConfigError(`Unknown HUBPAIR_LOG_LEVEL ${level}`);
    config.logLevel = level;
  }
  if (env.HUBPAIR_CONNECT_TIMEOUT_MS) {
    const timeout = coerceNumber(env.HUBPAIR_CONNECT_TIMEOUT_MS, Number.NaN);
    if (!(timeout > 0)) throw new ConfigError("HUBPAIR_CONNECT_TIMEOUT_MS must be a positive integer");
    config.connectTimeoutMs = timeout;
  }
}

export function splitAndClean(value: string) {
  return value
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
}

function coerceNumber(value: unknown, fallback: number) {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function checkUrl(value: string, field: string, schemes: string[]): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch (err) {
    throw new ConfigError(`${field}: invalid URL ${value}`, err);
  }
  if (!schemes.includes(url.protocol)) {
    throw new ConfigError(`${field}: unsupported scheme ${url.protocol} in ${value}`);
  }
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

function resolvePath(value: string, baseDir: string): string {
  if (value === "~" || value.startsWith("~/")) return path.join(os.homedir(), value.slice(1));
  return path.resolve(baseDir, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
