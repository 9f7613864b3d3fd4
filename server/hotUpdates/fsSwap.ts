import fs from "node:fs/promises";
import path from "node:path";

import { nanoid } from "nanoid";

import type { Version } from "./types.js";

export const VERSION_MARKER_FILE = ".content-version";
const TEMP_SIBLING_MARKER = ".tmp-";

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.stat(targetPath);
    return true;
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    return (await fs.stat(targetPath)).isDirectory();
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

export async function isNonEmptyDirectory(targetPath: string): Promise<boolean> {
  if (!(await isDirectory(targetPath))) {
    return false;
  }

  const entries = await fs.readdir(targetPath);
  return entries.some((entry) => entry !== VERSION_MARKER_FILE);
}

export async function removePath(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export function createTempSiblingPath(targetPath: string): string {
  return `${targetPath}${TEMP_SIBLING_MARKER}${nanoid(8)}`;
}

export function isTempSiblingName(name: string): boolean {
  return name.includes(TEMP_SIBLING_MARKER);
}

/**
 * Runs `operation` with a fresh sibling path of `targetPath`. Whatever is left at the
 * sibling path is removed afterwards, on success and on failure alike.
 */
export async function withTempSibling<T>(
  targetPath: string,
  operation: (tempPath: string) => Promise<T>
): Promise<T> {
  const tempPath = createTempSiblingPath(targetPath);
  try {
    return await operation(tempPath);
  } finally {
    await removePath(tempPath);
  }
}

/** Rename, falling back to copy-and-delete across devices. */
export async function moveDirectory(fromPath: string, toPath: string): Promise<void> {
  await fs.mkdir(path.dirname(toPath), { recursive: true });
  try {
    await fs.rename(fromPath, toPath);
  } catch (error) {
    if (errorCode(error) !== "EXDEV") {
      throw error;
    }
    await withTempSibling(toPath, async (tempPath) => {
      await fs.cp(fromPath, tempPath, { recursive: true });
      await fs.rename(tempPath, toPath);
    });
    await removePath(fromPath);
  }
}

export async function writeVersionMarker(rootPath: string, version: Version): Promise<void> {
  await fs.writeFile(path.join(rootPath, VERSION_MARKER_FILE), `${version}\n`, "utf8");
}

export async function readVersionMarker(rootPath: string): Promise<Version | null> {
  try {
    const raw = await fs.readFile(path.join(rootPath, VERSION_MARKER_FILE), "utf8");
    const trimmed = raw.trim();
    return trimmed.length > 0 ? trimmed : null;
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") {
      return null;
    }
    throw error;
  }
}

export const CONTENT_DIR_NAME = "www";

/**
 * Finds the web content inside an extracted archive: the archive root itself when it
 * holds the entry file, otherwise a `www` folder at the root or one level below.
 */
export async function findContentFolder(extractedRoot: string, entryFile: string): Promise<string | null> {
  const direct = path.join(extractedRoot, CONTENT_DIR_NAME);
  if (await isDirectory(direct)) {
    return direct;
  }

  const entries = await fs.readdir(extractedRoot, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name === "__MACOSX") {
      continue;
    }
    const nested = path.join(extractedRoot, entry.name, CONTENT_DIR_NAME);
    if (await isDirectory(nested)) {
      return nested;
    }
  }

  if (await pathExists(path.join(extractedRoot, entryFile))) {
    return extractedRoot;
  }

  return null;
}

export interface ActivationPaths {
  active: string;
  staging: string;
  backup: string;
}

/**
 * Promotes `staging` to `active`, keeping the previous active root as `backup`.
 * On failure the previous active root is put back before the error propagates.
 */
export async function activateStagedRoot(paths: ActivationPaths): Promise<void> {
  await removePath(paths.backup);

  const hadActive = await pathExists(paths.active);
  if (hadActive) {
    await fs.rename(paths.active, paths.backup);
  }

  try {
    await moveDirectory(paths.staging, paths.active);
  } catch (error) {
    if (hadActive && !(await pathExists(paths.active))) {
      await fs.rename(paths.backup, paths.active);
    }
    throw error;
  }
}

export interface RestorePaths {
  active: string;
  backup: string;
}

/** Puts `backup` back as `active`; the failed active root is discarded. */
export async function restoreBackupRoot(paths: RestorePaths): Promise<void> {
  await withTempSibling(paths.active, async (discardedPath) => {
    const hadActive = await pathExists(paths.active);
    if (hadActive) {
      await fs.rename(paths.active, discardedPath);
    }

    try {
      await fs.rename(paths.backup, paths.active);
    } catch (error) {
      if (hadActive) {
        await fs.rename(discardedPath, paths.active);
      }
      throw error;
    }
  });
}

/** Replaces `active` with a fresh copy of `source`, tagged with `version`. */
export async function replaceRootFromSource(active: string, source: string, version: Version): Promise<void> {
  await withTempSibling(active, async (incomingPath) => {
    await fs.cp(source, incomingPath, { recursive: true });
    await writeVersionMarker(incomingPath, version);

    await withTempSibling(active, async (discardedPath) => {
      const hadActive = await pathExists(active);
      if (hadActive) {
        await fs.rename(active, discardedPath);
      }

      try {
        await fs.rename(incomingPath, active);
      } catch (error) {
        if (hadActive) {
          await fs.rename(discardedPath, active);
        }
        throw error;
      }
    });
  });
}

/** Removes leftovers of interrupted scoped operations inside `dirPath`. */
export async function removeTempSiblings(dirPath: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dirPath);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }

  const removed: string[] = [];
  for (const entry of entries) {
    if (!isTempSiblingName(entry)) {
      continue;
    }
    const entryPath = path.join(dirPath, entry);
    await removePath(entryPath);
    removed.push(entryPath);
  }
  return removed;
}
