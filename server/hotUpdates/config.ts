import path from "node:path";

import { DEFAULT_BUNDLE_VERSION } from "./bundleInfo.js";
import { STATE_FILE_NAME } from "./contentRoots.js";

export interface HotUpdateRuntimeConfig {
  port: number;
  host: string;
  authToken: string;
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  dataDir: string;
  statePath: string;
  bundleDir: string;
  bundleVersion: string;
  entryFile: string;
  manifestUrl: string;
  autoCheck: boolean;
  autoDownload: boolean;
  checkIntervalMs: number;
  canaryTimeoutMs: number;
  downloadTimeoutMs: number;
  extractTimeoutMs: number;
  manifestTimeoutMs: number;
  unzipBinary: string;
  enableDebugApi: boolean;
}

const defaultPort = 8790;
const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

function parsePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, parsed));
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

function parseCorsOrigins(raw: string | undefined): {
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const corsOrigins = configured.length > 0 ? configured : ["http://localhost", "http://127.0.0.1", "null"];

  return {
    corsOrigins,
    allowAnyCorsOrigin: corsOrigins.includes("*")
  };
}

function normalizeEntryFile(raw: string | undefined): string {
  const trimmed = (raw ?? "").trim();
  if (trimmed.length === 0 || trimmed.includes("/") || trimmed.includes("\\") || trimmed.startsWith(".")) {
    return "index.html";
  }
  return trimmed;
}

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const configured = (env.HOT_UPDATES_DATA_DIR ?? "").trim();
  return path.resolve(cwd, configured.length > 0 ? configured : "data");
}

export function resolveHotUpdateConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): HotUpdateRuntimeConfig {
  const { corsOrigins, allowAnyCorsOrigin } = parseCorsOrigins(env.HOT_UPDATES_CORS_ORIGINS);
  const dataDir = resolveDataDir(env, cwd);

  return {
    port: parsePort(env.HOT_UPDATES_PORT),
    host: (env.HOT_UPDATES_HOST ?? "127.0.0.1").trim() || "127.0.0.1",
    authToken: (env.HOT_UPDATES_AUTH_TOKEN ?? "").trim(),
    corsOrigins,
    allowAnyCorsOrigin,
    dataDir,
    statePath: path.join(dataDir, STATE_FILE_NAME),
    bundleDir: path.resolve(cwd, (env.HOT_UPDATES_BUNDLE_DIR ?? "www").trim() || "www"),
    bundleVersion: (env.HOT_UPDATES_BUNDLE_VERSION ?? "").trim() || DEFAULT_BUNDLE_VERSION,
    entryFile: normalizeEntryFile(env.HOT_UPDATES_ENTRY_FILE),
    manifestUrl: (env.HOT_UPDATES_MANIFEST_URL ?? "").trim(),
    autoCheck: parseBooleanEnv(env.HOT_UPDATES_AUTO_CHECK, false),
    autoDownload: parseBooleanEnv(env.HOT_UPDATES_AUTO_DOWNLOAD, false),
    checkIntervalMs: parseIntEnv(env.HOT_UPDATES_CHECK_INTERVAL_MS, 300_000, 30_000, 86_400_000),
    canaryTimeoutMs: parseIntEnv(env.HOT_UPDATES_CANARY_TIMEOUT_MS, 20_000, 1_000, 600_000),
    downloadTimeoutMs: parseIntEnv(env.HOT_UPDATES_DOWNLOAD_TIMEOUT_MS, 60_000, 2_000, 600_000),
    extractTimeoutMs: parseIntEnv(env.HOT_UPDATES_EXTRACT_TIMEOUT_MS, 120_000, 5_000, 600_000),
    manifestTimeoutMs: parseIntEnv(env.HOT_UPDATES_MANIFEST_TIMEOUT_MS, 10_000, 2_000, 120_000),
    unzipBinary: (env.HOT_UPDATES_UNZIP_BINARY ?? "unzip").trim() || "unzip",
    enableDebugApi: parseBooleanEnv(env.HOT_UPDATES_ENABLE_DEBUG_API, false)
  };
}
