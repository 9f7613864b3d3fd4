import path from "node:path";

import type { HotUpdateStateSnapshot, Version } from "./types.js";

export const ACTIVE_DIR_NAME = "www";
export const BACKUP_DIR_NAME = "www_previous";
export const STAGING_DIR_NAME = "staging";
export const TEMP_DIR_NAME = "tmp";
export const STATE_FILE_NAME = "state.json";

export interface ContentLayout {
  dataDir: string;
  bundleDir: string;
}

export interface ContentRoots {
  active: string;
  staging: string | null;
  backup: string | null;
  bundle: string;
  temp: string;
}

export function createContentLayout(dataDir: string, bundleDir: string): ContentLayout {
  return {
    dataDir: path.resolve(dataDir),
    bundleDir: path.resolve(bundleDir)
  };
}

export function activeRootPath(layout: ContentLayout): string {
  return path.join(layout.dataDir, ACTIVE_DIR_NAME);
}

export function backupRootPath(layout: ContentLayout): string {
  return path.join(layout.dataDir, BACKUP_DIR_NAME);
}

export function stagingParentPath(layout: ContentLayout): string {
  return path.join(layout.dataDir, STAGING_DIR_NAME);
}

export function tempRootPath(layout: ContentLayout): string {
  return path.join(layout.dataDir, TEMP_DIR_NAME);
}

export function toStagingDirName(version: Version): string {
  const safe = version.trim().replace(/[^0-9A-Za-z._-]/g, "_").replace(/^\.+/, "_");
  return safe.length > 0 ? safe : "_";
}

export function stagingPathFor(layout: ContentLayout, version: Version): string {
  return path.join(stagingParentPath(layout), toStagingDirName(version));
}

/** Derives every root from the persisted record; touches no files. */
export function resolveContentRoots(state: HotUpdateStateSnapshot, layout: ContentLayout): ContentRoots {
  const lifecycle = state.lifecycle;

  return {
    active: activeRootPath(layout),
    staging: lifecycle.phase === "staged" ? stagingPathFor(layout, lifecycle.version) : null,
    backup: lifecycle.phase === "canary_pending" ? backupRootPath(layout) : null,
    bundle: layout.bundleDir,
    temp: tempRootPath(layout)
  };
}
