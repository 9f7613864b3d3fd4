import fs from "node:fs/promises";
import path from "node:path";

import {
  activeRootPath,
  backupRootPath,
  stagingParentPath,
  stagingPathFor,
  tempRootPath,
  toStagingDirName,
  type ContentLayout
} from "./contentRoots.js";
import {
  isDirectory,
  isNonEmptyDirectory,
  pathExists,
  readVersionMarker,
  removePath,
  removeTempSiblings,
  replaceRootFromSource
} from "./fsSwap.js";
import type { HotUpdateStateStore } from "./state.js";
import type {
  BundleInfoProvider,
  CanaryOutcome,
  CanaryPendingLifecycle,
  ContentSwitchReason,
  HotUpdateLogger,
  HotUpdateStateSnapshot,
  InstallOutcome,
  RecoveryReport,
  Version
} from "./types.js";
import { isNewerVersion, sameVersion } from "./versioning.js";

export interface RecoveryContext {
  layout: ContentLayout;
  store: HotUpdateStateStore;
  bundleInfo: BundleInfoProvider;
  logger: HotUpdateLogger;
  now: () => Date;
  emit: (reason: ContentSwitchReason, version: Version, canaryPending: boolean) => void;
  installStaged: () => Promise<InstallOutcome>;
  /** Records a rollback whose directory swap already happened. */
  commitRollback: (
    state: HotUpdateStateSnapshot,
    canary: CanaryPendingLifecycle,
    reason: ContentSwitchReason
  ) => CanaryOutcome;
  rollbackCanary: (state: HotUpdateStateSnapshot, canary: CanaryPendingLifecycle) => Promise<CanaryOutcome>;
}

async function recoverStaged(context: RecoveryContext, actions: string[]): Promise<void> {
  const state = context.store.read();
  if (state.lifecycle.phase !== "staged") {
    return;
  }

  const version = state.lifecycle.version;
  const active = activeRootPath(context.layout);
  const backup = backupRootPath(context.layout);
  const stagingPath = stagingPathFor(context.layout, version);

  if (!(await isNonEmptyDirectory(active)) && (await isNonEmptyDirectory(backup))) {
    await fs.rename(backup, active);
    actions.push("restored previous content after an interrupted swap");
  }

  const activeMarker = await readVersionMarker(active);
  const stagingReady = await isNonEmptyDirectory(stagingPath);

  if (sameVersion(activeMarker, version) && !stagingReady) {
    context.store.save({
      ...state,
      installedVersion: version,
      ignoreList: state.ignoreList.filter((entry) => entry !== version),
      versionHistory: state.versionHistory.includes(version)
        ? state.versionHistory
        : [...state.versionHistory, version],
      lifecycle: {
        phase: "canary_pending",
        version,
        previousVersion: state.installedVersion,
        activatedAt: context.now().toISOString()
      }
    });
    actions.push(`completed interrupted install of ${version}`);
    context.emit("recovery", version, true);
    return;
  }

  if (stagingReady) {
    await context.installStaged();
    actions.push(`installed pending update ${version}`);
    return;
  }

  context.store.save({ ...state, lifecycle: { phase: "idle" } });
  actions.push(`dropped pending update ${version}, its files are missing`);
}

async function recoverCanary(context: RecoveryContext, actions: string[]): Promise<void> {
  const state = context.store.read();
  if (state.lifecycle.phase !== "canary_pending") {
    return;
  }

  const canary = state.lifecycle;
  const active = activeRootPath(context.layout);
  const backup = backupRootPath(context.layout);
  const activeExists = await isNonEmptyDirectory(active);
  const backupExists = await isNonEmptyDirectory(backup);
  const activeMarker = activeExists ? await readVersionMarker(active) : null;

  const rollbackSwapped =
    activeExists && !backupExists && canary.previousVersion !== null && sameVersion(activeMarker, canary.previousVersion);
  if (rollbackSwapped) {
    context.commitRollback(state, canary, "recovery");
    actions.push(`completed interrupted rollback of ${canary.version}`);
    return;
  }

  if (!activeExists && backupExists) {
    await context.rollbackCanary(state, canary);
    actions.push(`completed interrupted rollback of ${canary.version}`);
    return;
  }

  if (!activeExists) {
    const bundleVersion = context.bundleInfo.getBundleVersion();
    await replaceRootFromSource(active, context.bundleInfo.getBundleContentPath(), bundleVersion);
    context.commitRollback(state, { ...canary, previousVersion: bundleVersion }, "recovery");
    actions.push(`restored bundle ${bundleVersion}, content of ${canary.version} was missing`);
    return;
  }

  actions.push(`version ${canary.version} is still awaiting confirmation`);
  context.emit("recovery", canary.version, true);
}

/**
 * Makes the record agree with the `.content-version` marker of an existing active root.
 * A lost or reset state file would otherwise report the bundle version while newer hot
 * content is being served, letting an older update replace it.
 * Returns true when the active root was repaired or replaced.
 */
async function reconcileActiveMarker(
  context: RecoveryContext,
  state: HotUpdateStateSnapshot,
  actions: string[]
): Promise<boolean> {
  const active = activeRootPath(context.layout);
  const marker = await readVersionMarker(active);
  if (marker === null || sameVersion(marker, state.installedVersion)) {
    return false;
  }

  const bundleVersion = context.bundleInfo.getBundleVersion();
  const ignored = state.ignoreList.some((entry) => sameVersion(entry, marker));
  if (!ignored && !isNewerVersion(bundleVersion, marker)) {
    context.store.save({
      ...state,
      installedVersion: marker,
      versionHistory: state.versionHistory.some((entry) => sameVersion(entry, marker))
        ? state.versionHistory
        : [...state.versionHistory, marker]
    });
    actions.push(`adopted ${marker} from the active content, state recorded ${state.installedVersion}`);
    return true;
  }

  await replaceRootFromSource(active, context.bundleInfo.getBundleContentPath(), bundleVersion);
  context.store.save({ ...state, installedVersion: bundleVersion });
  actions.push(`replaced unrecorded content ${marker} with bundle ${bundleVersion}`);
  context.emit("reset", bundleVersion, false);
  return true;
}

async function recoverIdle(context: RecoveryContext, actions: string[]): Promise<void> {
  const state = context.store.read();
  if (state.lifecycle.phase !== "idle") {
    return;
  }

  const active = activeRootPath(context.layout);
  const backup = backupRootPath(context.layout);
  const bundleVersion = context.bundleInfo.getBundleVersion();
  const bundlePath = context.bundleInfo.getBundleContentPath();

  if (!(await isNonEmptyDirectory(active))) {
    const backupMarker = await readVersionMarker(backup);
    if (sameVersion(backupMarker, state.installedVersion) && (await isNonEmptyDirectory(backup))) {
      await fs.rename(backup, active);
      actions.push(`restored ${state.installedVersion} from backup`);
      return;
    }

    await replaceRootFromSource(active, bundlePath, bundleVersion);
    context.store.save({ ...state, installedVersion: bundleVersion });
    actions.push(`initialized content from bundle ${bundleVersion}`);
    context.emit("reset", bundleVersion, false);
  } else {
    const repaired = await reconcileActiveMarker(context, state, actions);
    if (!repaired && isNewerVersion(bundleVersion, state.installedVersion)) {
      await replaceRootFromSource(active, bundlePath, bundleVersion);
      context.store.save({ ...state, installedVersion: bundleVersion });
      actions.push(`replaced ${state.installedVersion} with newer bundle ${bundleVersion}`);
      context.emit("reset", bundleVersion, false);
    }
  }

  if (await isNonEmptyDirectory(backup)) {
    await removePath(backup);
    actions.push("removed stale backup");
  }
}

async function removeStaleStaging(context: RecoveryContext, actions: string[]): Promise<void> {
  const state = context.store.read();
  const keep = state.lifecycle.phase === "staged" ? toStagingDirName(state.lifecycle.version) : null;
  const parent = stagingParentPath(context.layout);

  if (!(await isDirectory(parent))) {
    return;
  }

  for (const entry of await fs.readdir(parent)) {
    if (entry === keep) {
      continue;
    }
    await removePath(path.join(parent, entry));
    actions.push(`removed stale staging ${entry}`);
  }
}

/**
 * Brings files and state back to a consistent pair after any interruption: a download
 * that died with the process, an install or rollback stopped between its directory
 * renames and its state write, or a missing active root.
 */
export async function recoverLaunchState(context: RecoveryContext): Promise<RecoveryReport> {
  const actions: string[] = [];
  const { layout, store, logger } = context;

  await fs.mkdir(layout.dataDir, { recursive: true });
  const removedSiblings = [
    ...(await removeTempSiblings(layout.dataDir)),
    ...(await removeTempSiblings(stagingParentPath(layout)))
  ];
  if (removedSiblings.length > 0) {
    actions.push(`removed ${removedSiblings.length} leftover temporary entries`);
  }
  await removePath(tempRootPath(layout));

  const loaded = store.load();
  if (loaded.lifecycle.phase === "downloading") {
    store.save({ ...loaded, lifecycle: { phase: "idle" } });
    actions.push(`discarded interrupted download of ${loaded.lifecycle.version}`);
  }

  if (loaded.lifecycle.phase === "staged") {
    await recoverStaged(context, actions);
  } else if (loaded.lifecycle.phase === "canary_pending") {
    await recoverCanary(context, actions);
  }
  await recoverIdle(context, actions);
  await removeStaleStaging(context, actions);

  const bundleVersion = context.bundleInfo.getBundleVersion();
  const current = store.read();
  if (current.bundleVersion !== bundleVersion || !(await pathExists(store.path))) {
    store.save({ ...current, bundleVersion });
  }

  const final = store.read();
  for (const action of actions) {
    logger.info(`[hot-updates-recovery] ${action}`);
  }

  return {
    phase: final.lifecycle.phase,
    installedVersion: final.installedVersion,
    actions
  };
}
