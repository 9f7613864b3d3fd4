import fs from "node:fs";
import path from "node:path";

import { nanoid } from "nanoid";

import type { HotUpdateLogger, HotUpdateStateSnapshot, LifecycleState, Version, VersionInfo } from "./types.js";
import { isNewerVersion, normalizeVersion, sameVersion } from "./versioning.js";

export interface HotUpdateStateStoreOptions {
  bundleVersion: Version;
  logger?: HotUpdateLogger;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function normalizeVersionList(value: unknown): Version[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const seen = new Set<Version>();
  for (const entry of value) {
    const version = normalizeVersion(entry);
    if (version) {
      seen.add(version);
    }
  }
  return [...seen];
}

export function createDefaultState(bundleVersion: Version, now: Date = new Date()): HotUpdateStateSnapshot {
  return {
    schemaVersion: 1,
    bundleVersion,
    installedVersion: bundleVersion,
    lifecycle: { phase: "idle" },
    ignoreList: [],
    versionHistory: [bundleVersion],
    updatedAt: now.toISOString()
  };
}

function normalizeLifecycle(
  value: unknown,
  installedVersion: Version,
  ignoreList: Version[],
  fallbackTimestamp: string,
  repairs: string[]
): LifecycleState {
  if (!isRecord(value)) {
    return { phase: "idle" };
  }

  const phase = normalizeString(value.phase);
  const version = normalizeVersion(value.version);

  if (phase === "downloading" || phase === "staged") {
    if (!version) {
      repairs.push(`dropped ${phase} lifecycle without a version`);
      return { phase: "idle" };
    }
    if (!isNewerVersion(version, installedVersion)) {
      repairs.push(`dropped ${phase} version ${version}, not newer than installed ${installedVersion}`);
      return { phase: "idle" };
    }
    if (ignoreList.includes(version)) {
      repairs.push(`dropped ${phase} version ${version}, it is on the ignore list`);
      return { phase: "idle" };
    }

    if (phase === "downloading") {
      return {
        phase,
        version,
        startedAt: normalizeString(value.startedAt) ?? fallbackTimestamp
      };
    }

    return {
      phase,
      version,
      stagedAt: normalizeString(value.stagedAt) ?? fallbackTimestamp
    };
  }

  if (phase === "canary_pending") {
    if (!version || !sameVersion(version, installedVersion)) {
      repairs.push(`dropped canary for ${version ?? "unknown version"}, installed is ${installedVersion}`);
      return { phase: "idle" };
    }

    return {
      phase,
      version,
      previousVersion: normalizeVersion(value.previousVersion) ?? null,
      activatedAt: normalizeString(value.activatedAt) ?? fallbackTimestamp
    };
  }

  if (phase !== undefined && phase !== "idle") {
    repairs.push(`replaced unknown lifecycle phase "${phase}" with idle`);
  }
  return { phase: "idle" };
}

/**
 * Validates a raw record and repairs every broken invariant instead of rejecting it.
 * Each repair is reported so the caller can log it.
 */
export function normalizeState(
  value: unknown,
  bundleVersion: Version,
  now: Date = new Date()
): { state: HotUpdateStateSnapshot; repairs: string[] } {
  if (!isRecord(value)) {
    return { state: createDefaultState(bundleVersion, now), repairs: [] };
  }

  const repairs: string[] = [];
  const fallbackTimestamp = now.toISOString();
  const installedVersion = normalizeVersion(value.installedVersion) ?? bundleVersion;
  let ignoreList = normalizeVersionList(value.ignoreList);
  if (ignoreList.includes(installedVersion)) {
    repairs.push(`removed installed version ${installedVersion} from the ignore list`);
    ignoreList = ignoreList.filter((entry) => entry !== installedVersion);
  }

  const versionHistory = normalizeVersionList(value.versionHistory);

  return {
    state: {
      schemaVersion: 1,
      bundleVersion: normalizeVersion(value.bundleVersion) ?? bundleVersion,
      installedVersion,
      lifecycle: normalizeLifecycle(value.lifecycle, installedVersion, ignoreList, fallbackTimestamp, repairs),
      ignoreList,
      versionHistory: versionHistory.length > 0 ? versionHistory : [installedVersion],
      updatedAt: normalizeString(value.updatedAt) ?? fallbackTimestamp
    },
    repairs
  };
}

export class HotUpdateStateStore {
  private state: HotUpdateStateSnapshot;
  private readonly logger: HotUpdateLogger;
  private readonly now: () => Date;

  constructor(
    private readonly statePath: string,
    private readonly options: HotUpdateStateStoreOptions
  ) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.state = this.load();
  }

  get path(): string {
    return this.statePath;
  }

  load(): HotUpdateStateSnapshot {
    let raw: string;
    try {
      raw = fs.readFileSync(this.statePath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        this.state = createDefaultState(this.options.bundleVersion, this.now());
        return this.read();
      }
      this.logger.warn("[hot-updates-state] Could not read state, starting from defaults.", error);
      this.state = createDefaultState(this.options.bundleVersion, this.now());
      return this.read();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("[hot-updates-state] State file is not valid JSON, starting from defaults.", error);
      parsed = null;
    }

    const { state, repairs } = normalizeState(parsed, this.options.bundleVersion, this.now());
    for (const repair of repairs) {
      this.logger.warn(`[hot-updates-state] Repaired state: ${repair}.`);
    }

    this.state = state;
    return this.read();
  }

  read(): HotUpdateStateSnapshot {
    return structuredClone(this.state);
  }

  save(next: HotUpdateStateSnapshot): HotUpdateStateSnapshot {
    const { state, repairs } = normalizeState(
      { ...next, updatedAt: this.now().toISOString() },
      this.options.bundleVersion,
      this.now()
    );
    for (const repair of repairs) {
      this.logger.warn(`[hot-updates-state] Repaired state before save: ${repair}.`);
    }

    this.persist(state);
    this.state = state;
    return this.read();
  }

  patch(patch: Partial<HotUpdateStateSnapshot>): HotUpdateStateSnapshot {
    return this.save({
      ...this.state,
      ...patch
    });
  }

  private persist(state: HotUpdateStateSnapshot): void {
    const dirPath = path.dirname(this.statePath);
    fs.mkdirSync(dirPath, { recursive: true });

    const tempPath = `${this.statePath}.tmp-${nanoid(8)}`;
    try {
      fs.writeFileSync(tempPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
      fs.renameSync(tempPath, this.statePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

export function describeState(state: HotUpdateStateSnapshot, appBundleVersion: Version): VersionInfo {
  const lifecycle = state.lifecycle;
  const pendingVersion =
    lifecycle.phase === "downloading" || lifecycle.phase === "staged" ? lifecycle.version : null;

  return {
    installedVersion: state.installedVersion,
    appBundleVersion,
    pendingVersion,
    previousVersion: lifecycle.phase === "canary_pending" ? lifecycle.previousVersion : null,
    canaryVersion: lifecycle.phase === "canary_pending" ? lifecycle.version : null,
    hasPendingUpdate: pendingVersion !== null,
    pendingUpdateReady: lifecycle.phase === "staged",
    downloadInProgress: lifecycle.phase === "downloading",
    phase: lifecycle.phase,
    ignoreList: [...state.ignoreList],
    versionHistory: [...state.versionHistory]
  };
}
