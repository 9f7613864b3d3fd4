import fs from "node:fs/promises";
import path from "node:path";

import { nanoid } from "nanoid";

import { createCancellationError } from "./cancellation.js";
import {
  activeRootPath,
  backupRootPath,
  resolveContentRoots,
  stagingPathFor,
  tempRootPath,
  type ContentLayout,
  type ContentRoots
} from "./contentRoots.js";
import { HotUpdateError, toErrorMessage, wrapHotUpdateError } from "./errors.js";
import {
  activateStagedRoot,
  findContentFolder,
  isNonEmptyDirectory,
  moveDirectory,
  pathExists,
  removePath,
  replaceRootFromSource,
  restoreBackupRoot,
  withTempSibling,
  writeVersionMarker
} from "./fsSwap.js";
import { recoverLaunchState } from "./recovery.js";
import { parseDownloadRequest, requireVersion } from "./requests.js";
import { createSerialQueue, type SerialQueue } from "./serialQueue.js";
import { describeState, type HotUpdateStateStore } from "./state.js";
import type {
  ArchiveExtractor,
  ArchiveFetcher,
  BundleInfoProvider,
  CanaryOutcome,
  CanaryPendingLifecycle,
  CanaryReport,
  CheckOutcome,
  ContentSwitchNotifier,
  ContentSwitchReason,
  DownloadOutcome,
  HotUpdateLogger,
  HotUpdateStateSnapshot,
  InstallOutcome,
  PendingUpdateInfo,
  ProgressListener,
  RecoveryReport,
  UpdateAvailableEvent,
  UpdateManifestSource,
  Version,
  VersionInfo
} from "./types.js";
import { isNewerVersion, sameVersion } from "./versioning.js";

export interface UpdateLifecycleManagerOptions {
  layout: ContentLayout;
  stateStore: HotUpdateStateStore;
  bundleInfo: BundleInfoProvider;
  fetcher: ArchiveFetcher;
  extractor: ArchiveExtractor;
  notifier: ContentSwitchNotifier;
  manifestSource?: UpdateManifestSource;
  entryFile?: string;
  autoDownload?: boolean;
  logger?: HotUpdateLogger;
  now?: () => Date;
}

export interface DownloadTicket {
  id: string;
  version: Version;
  signal: AbortSignal;
  cancel: () => void;
}

interface ActiveDownload {
  ticket: DownloadTicket;
  controller: AbortController;
}

export interface CancelDownloadResult {
  cancelled: boolean;
  version: Version | null;
}

const DEFAULT_ENTRY_FILE = "index.html";

function withVersion(list: Version[], version: Version): Version[] {
  return list.includes(version) ? [...list] : [...list, version];
}

function withoutVersion(list: Version[], version: Version): Version[] {
  return list.filter((entry) => entry !== version);
}

/**
 * Owns the persisted update state and the content roots on disk. Every mutation runs
 * through one serial queue, so state writes and directory swaps never interleave.
 */
export class UpdateLifecycleManager {
  private readonly queue: SerialQueue = createSerialQueue();
  private readonly layout: ContentLayout;
  private readonly store: HotUpdateStateStore;
  private readonly bundleInfo: BundleInfoProvider;
  private readonly fetcher: ArchiveFetcher;
  private readonly extractor: ArchiveExtractor;
  private readonly notifier: ContentSwitchNotifier;
  private readonly manifestSource: UpdateManifestSource | undefined;
  private readonly entryFile: string;
  private readonly autoDownload: boolean;
  private readonly logger: HotUpdateLogger;
  private readonly now: () => Date;
  private activeDownload: ActiveDownload | null = null;

  constructor(options: UpdateLifecycleManagerOptions) {
    this.layout = options.layout;
    this.store = options.stateStore;
    this.bundleInfo = options.bundleInfo;
    this.fetcher = options.fetcher;
    this.extractor = options.extractor;
    this.notifier = options.notifier;
    this.manifestSource = options.manifestSource;
    this.entryFile = options.entryFile?.trim() || DEFAULT_ENTRY_FILE;
    this.autoDownload = options.autoDownload ?? false;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  getCurrentVersion(): Version {
    return this.store.read().installedVersion;
  }

  getVersionInfo(): VersionInfo {
    return describeState(this.store.read(), this.bundleInfo.getBundleVersion());
  }

  getPendingUpdateInfo(): PendingUpdateInfo {
    const info = this.getVersionInfo();
    return {
      hasPendingUpdate: info.pendingUpdateReady,
      pendingVersion: info.pendingUpdateReady ? info.pendingVersion : null,
      installedVersion: info.installedVersion,
      appBundleVersion: info.appBundleVersion,
      message: info.pendingUpdateReady
        ? `Update ${info.pendingVersion ?? ""} is ready and will be installed on the next launch.`
        : "No pending update."
    };
  }

  getIgnoreList(): Version[] {
    return this.store.read().ignoreList;
  }

  getVersionHistory(): Version[] {
    return this.store.read().versionHistory;
  }

  getContentRoots(): ContentRoots {
    return resolveContentRoots(this.store.read(), this.layout);
  }

  getActiveRootPath(): string {
    return activeRootPath(this.layout);
  }

  getEntryFile(): string {
    return this.entryFile;
  }

  isDownloadInProgress(): boolean {
    return this.activeDownload !== null || this.store.read().lifecycle.phase === "downloading";
  }

  /**
   * Decides what to do with a remote version. Ignored and older versions never reach the
   * fetcher. With a url, an available version is downloaded and staged.
   */
  async checkAvailable(event: UpdateAvailableEvent, onProgress?: ProgressListener): Promise<CheckOutcome> {
    const remoteVersion = requireVersion(event.version);
    const state = this.store.read();
    const lifecycle = state.lifecycle;

    if (!isNewerVersion(remoteVersion, state.installedVersion)) {
      return { status: "up_to_date", installedVersion: state.installedVersion, remoteVersion };
    }
    if (state.ignoreList.includes(remoteVersion)) {
      this.logger.info(`[hot-updates] Skipping ignored version ${remoteVersion}.`);
      return { status: "ignored", remoteVersion };
    }
    if (lifecycle.phase === "canary_pending") {
      return { status: "canary_pending", remoteVersion, canaryVersion: lifecycle.version };
    }
    if (lifecycle.phase === "staged" && sameVersion(lifecycle.version, remoteVersion)) {
      return { status: "already_staged", remoteVersion };
    }
    if (lifecycle.phase === "downloading") {
      return { status: "downloading", remoteVersion, pendingVersion: lifecycle.version };
    }

    const url = event.url?.trim();
    if (!url) {
      return { status: "available", remoteVersion };
    }

    const outcome = await this.downloadUpdate({ url, version: remoteVersion }, onProgress);
    if (outcome.status === "cancelled") {
      return { status: "available", remoteVersion, url };
    }
    return { status: "staged", remoteVersion };
  }

  async checkForUpdates(): Promise<CheckOutcome> {
    if (!this.manifestSource) {
      throw new HotUpdateError("MANIFEST_UNAVAILABLE", "No update manifest source is configured.");
    }

    const manifest = await this.manifestSource.fetchLatest();
    const outcome = await this.checkAvailable({
      version: manifest.version,
      url: this.autoDownload ? manifest.url : undefined
    });

    if (outcome.status === "available") {
      return { ...outcome, url: manifest.url };
    }
    return outcome;
  }

  async beginDownload(version: Version): Promise<DownloadTicket> {
    const target = requireVersion(version);
    if (this.activeDownload) {
      throw new HotUpdateError(
        "DOWNLOAD_IN_PROGRESS",
        `A download of ${this.activeDownload.ticket.version} is already in progress.`
      );
    }

    return this.queue.runExclusive(async () => {
      const state = this.store.read();
      const lifecycle = state.lifecycle;

      if (this.activeDownload || lifecycle.phase === "downloading") {
        throw new HotUpdateError("DOWNLOAD_IN_PROGRESS", "A download is already in progress.");
      }
      if (lifecycle.phase === "canary_pending") {
        throw new HotUpdateError(
          "CANARY_PENDING",
          `Version ${lifecycle.version} is awaiting confirmation; downloads resume after it is confirmed.`
        );
      }
      if (!isNewerVersion(target, state.installedVersion)) {
        throw new HotUpdateError(
          "VERSION_REJECTED",
          `Version ${target} is not newer than installed ${state.installedVersion}.`
        );
      }
      if (state.ignoreList.includes(target)) {
        throw new HotUpdateError("VERSION_REJECTED", `Version ${target} is on the ignore list.`);
      }

      if (lifecycle.phase === "staged") {
        this.logger.info(`[hot-updates] Discarding staged ${lifecycle.version} in favour of ${target}.`);
        await removePath(stagingPathFor(this.layout, lifecycle.version));
      }

      const controller = new AbortController();
      const ticket: DownloadTicket = {
        id: nanoid(10),
        version: target,
        signal: controller.signal,
        cancel: () => {
          if (!controller.signal.aborted) {
            controller.abort(createCancellationError());
          }
        }
      };

      this.store.save({
        ...state,
        lifecycle: { phase: "downloading", version: target, startedAt: this.now().toISOString() }
      });
      this.activeDownload = { ticket, controller };
      return ticket;
    });
  }

  /**
   * Verifies extracted content and moves it into the staging root for the ticket's
   * version. Failed verification discards the content and returns to idle without
   * ignoring the version.
   */
  async stagingComplete(ticket: DownloadTicket, extractedPath: string): Promise<DownloadOutcome> {
    return this.queue.runExclusive(async () => {
      const state = this.store.read();
      const lifecycle = state.lifecycle;
      const isCurrent =
        this.activeDownload?.ticket.id === ticket.id &&
        lifecycle.phase === "downloading" &&
        sameVersion(lifecycle.version, ticket.version);

      if (!isCurrent || ticket.signal.aborted) {
        await removePath(extractedPath);
        return { status: "cancelled", version: ticket.version };
      }

      const hasContent = await isNonEmptyDirectory(extractedPath);
      const hasEntry = hasContent && (await pathExists(path.join(extractedPath, this.entryFile)));
      if (!hasEntry) {
        await removePath(extractedPath);
        this.activeDownload = null;
        this.store.save({ ...state, lifecycle: { phase: "idle" } });
        throw new HotUpdateError(
          "EXTRACTION_FAILED",
          hasContent
            ? `Update ${ticket.version} is missing ${this.entryFile}.`
            : `Update ${ticket.version} has no content.`
        );
      }

      const stagingPath = stagingPathFor(this.layout, ticket.version);
      try {
        await removePath(stagingPath);
        await withTempSibling(stagingPath, async (tempPath) => {
          await moveDirectory(extractedPath, tempPath);
          await writeVersionMarker(tempPath, ticket.version);
          await fs.rename(tempPath, stagingPath);
        });
      } catch (error) {
        this.activeDownload = null;
        this.store.save({ ...state, lifecycle: { phase: "idle" } });
        throw wrapHotUpdateError("TEMP_DIR_ERROR", `Could not stage ${ticket.version}`, error);
      }

      this.activeDownload = null;
      this.store.save({
        ...state,
        lifecycle: { phase: "staged", version: ticket.version, stagedAt: this.now().toISOString() }
      });
      this.logger.info(`[hot-updates] Staged ${ticket.version}; it will be installed on the next launch.`);
      return { status: "staged", version: ticket.version };
    });
  }

  async downloadUpdate(request: unknown, onProgress?: ProgressListener): Promise<DownloadOutcome> {
    const { url, version } = parseDownloadRequest(request);
    const state = this.store.read();

    if (sameVersion(state.installedVersion, version)) {
      return { status: "already_installed", version };
    }
    if (state.lifecycle.phase === "staged" && sameVersion(state.lifecycle.version, version)) {
      return { status: "already_staged", version };
    }

    const ticket = await this.beginDownload(version);
    const workDir = path.join(tempRootPath(this.layout), `download-${ticket.id}`);
    this.logger.info(`[hot-updates] Downloading ${version} from ${url}.`);

    try {
      const archivePath = await this.fetcher.fetch(url, {
        tempDir: workDir,
        signal: ticket.signal,
        onProgress
      });
      if (ticket.signal.aborted) {
        throw createCancellationError();
      }

      const extractedPath = path.join(workDir, "extracted");
      await this.extractor.extract(archivePath, extractedPath);

      let contentPath: string | null;
      try {
        contentPath = await findContentFolder(extractedPath, this.entryFile);
      } catch (error) {
        throw wrapHotUpdateError("TEMP_DIR_ERROR", "Could not inspect extracted update", error);
      }
      if (!contentPath) {
        throw new HotUpdateError("WWW_NOT_FOUND", `Update ${version} does not contain a www folder.`);
      }

      const outcome = await this.stagingComplete(ticket, contentPath);
      if (outcome.status === "cancelled") {
        await this.abandonDownload(ticket);
      }
      return outcome;
    } catch (error) {
      await this.abandonDownload(ticket);
      if (ticket.signal.aborted) {
        this.logger.info(`[hot-updates] Download of ${version} cancelled.`);
        return { status: "cancelled", version };
      }
      this.logger.warn(`[hot-updates] Download of ${version} failed: ${toErrorMessage(error)}`);
      throw wrapHotUpdateError("DOWNLOAD_FAILED", `Download of ${version} failed`, error);
    } finally {
      await removePath(workDir);
    }
  }

  cancelDownload(): CancelDownloadResult {
    const active = this.activeDownload;
    if (!active) {
      return { cancelled: false, version: null };
    }

    active.ticket.cancel();
    return { cancelled: true, version: active.ticket.version };
  }

  async install(): Promise<InstallOutcome> {
    return this.queue.runExclusive(() => this.installStaged("install"));
  }

  async reportCanary(report: CanaryReport): Promise<CanaryOutcome> {
    const version = requireVersion(report.version);

    return this.queue.runExclusive(async () => {
      const state = this.store.read();
      const lifecycle = state.lifecycle;
      if (lifecycle.phase !== "canary_pending" || !sameVersion(lifecycle.version, version)) {
        return { status: "not_pending", version };
      }

      if (!report.success) {
        return this.rollbackCanary(state, lifecycle, "rollback");
      }

      this.store.save({ ...state, lifecycle: { phase: "idle" } });
      await this.removeBackupRoot();
      this.logger.info(`[hot-updates] Version ${version} confirmed.`);
      return { status: "committed", version };
    });
  }

  async rollback(): Promise<CanaryOutcome> {
    return this.queue.runExclusive(async () => {
      const state = this.store.read();
      const lifecycle = state.lifecycle;
      if (lifecycle.phase !== "canary_pending") {
        throw new HotUpdateError("ROLLBACK_UNAVAILABLE", "There is no unconfirmed update to roll back.");
      }
      return this.rollbackCanary(state, lifecycle, "rollback");
    });
  }

  async addToIgnoreList(version: Version): Promise<Version[]> {
    const target = requireVersion(version);

    return this.queue.runExclusive(async () => {
      let state = this.store.read();
      if (sameVersion(state.installedVersion, target)) {
        throw new HotUpdateError("VERSION_INSTALLED", `Version ${target} is installed and cannot be ignored.`);
      }

      const lifecycle = state.lifecycle;
      if (lifecycle.phase === "staged" && sameVersion(lifecycle.version, target)) {
        await removePath(stagingPathFor(this.layout, target));
        state = { ...state, lifecycle: { phase: "idle" } };
      }
      if (lifecycle.phase === "downloading" && sameVersion(lifecycle.version, target)) {
        this.activeDownload?.ticket.cancel();
        this.activeDownload = null;
        state = { ...state, lifecycle: { phase: "idle" } };
      }

      return this.store.save({ ...state, ignoreList: withVersion(state.ignoreList, target) }).ignoreList;
    });
  }

  /** The version becomes eligible again on the next explicit check; nothing is fetched here. */
  async removeFromIgnoreList(version: Version): Promise<Version[]> {
    const target = requireVersion(version);

    return this.queue.runExclusive(() => {
      const state = this.store.read();
      return this.store.save({ ...state, ignoreList: withoutVersion(state.ignoreList, target) }).ignoreList;
    });
  }

  async clearIgnoreList(): Promise<Version[]> {
    return this.queue.runExclusive(() => this.store.save({ ...this.store.read(), ignoreList: [] }).ignoreList);
  }

  async launchRecovery(): Promise<RecoveryReport> {
    return this.queue.runExclusive(() => {
      this.activeDownload = null;
      return recoverLaunchState({
        layout: this.layout,
        store: this.store,
        bundleInfo: this.bundleInfo,
        logger: this.logger,
        now: this.now,
        emit: (reason, version, canaryPending) => this.emit(reason, version, canaryPending),
        installStaged: () => this.installStaged("recovery"),
        commitRollback: (state, canary, reason) => this.commitRollback(state, canary, reason),
        rollbackCanary: (state, canary) => this.rollbackCanary(state, canary, "recovery")
      });
    });
  }

  private async abandonDownload(ticket: DownloadTicket): Promise<void> {
    await this.queue.runExclusive(() => {
      if (this.activeDownload?.ticket.id === ticket.id) {
        this.activeDownload = null;
      }

      const state = this.store.read();
      const lifecycle = state.lifecycle;
      if (lifecycle.phase === "downloading" && sameVersion(lifecycle.version, ticket.version)) {
        this.store.save({ ...state, lifecycle: { phase: "idle" } });
      }
    });
  }

  private async installStaged(reason: ContentSwitchReason): Promise<InstallOutcome> {
    const state = this.store.read();
    const lifecycle = state.lifecycle;
    if (lifecycle.phase !== "staged") {
      throw new HotUpdateError("NO_UPDATE_READY", "No update is ready to install.");
    }

    const version = lifecycle.version;
    const stagingPath = stagingPathFor(this.layout, version);
    if (!(await isNonEmptyDirectory(stagingPath))) {
      this.store.save({ ...state, lifecycle: { phase: "idle" } });
      throw new HotUpdateError("UPDATE_FILES_NOT_FOUND", `Files for update ${version} are missing.`);
    }

    const active = activeRootPath(this.layout);
    try {
      await activateStagedRoot({
        active,
        staging: stagingPath,
        backup: backupRootPath(this.layout)
      });
    } catch (error) {
      throw wrapHotUpdateError("INSTALL_FAILED", `Could not activate ${version}`, error);
    }

    const previousVersion = state.installedVersion;
    this.store.save({
      ...state,
      installedVersion: version,
      ignoreList: withoutVersion(state.ignoreList, version),
      versionHistory: withVersion(state.versionHistory, version),
      lifecycle: {
        phase: "canary_pending",
        version,
        previousVersion,
        activatedAt: this.now().toISOString()
      }
    });

    this.logger.info(`[hot-updates] Installed ${version} (previous ${previousVersion}); awaiting confirmation.`);
    this.emit(reason, version, true);
    return { installedVersion: version, previousVersion, activeRootPath: active };
  }

  private async rollbackCanary(
    state: HotUpdateStateSnapshot,
    canary: CanaryPendingLifecycle,
    reason: ContentSwitchReason
  ): Promise<CanaryOutcome> {
    const active = activeRootPath(this.layout);
    const backup = backupRootPath(this.layout);
    const bundleVersion = this.bundleInfo.getBundleVersion();

    if (await isNonEmptyDirectory(backup)) {
      try {
        await restoreBackupRoot({ active, backup });
      } catch (error) {
        throw wrapHotUpdateError("INSTALL_FAILED", `Could not restore the previous content`, error);
      }
      return this.commitRollback(state, canary, reason);
    }

    if (canary.previousVersion === null || sameVersion(canary.previousVersion, bundleVersion)) {
      try {
        await replaceRootFromSource(active, this.bundleInfo.getBundleContentPath(), bundleVersion);
      } catch (error) {
        throw wrapHotUpdateError("INSTALL_FAILED", "Could not restore the bundled content", error);
      }
      return this.commitRollback(state, { ...canary, previousVersion: bundleVersion }, reason);
    }

    throw new HotUpdateError(
      "ROLLBACK_UNAVAILABLE",
      `No backup of ${canary.previousVersion} is available to roll back to.`
    );
  }

  private commitRollback(
    state: HotUpdateStateSnapshot,
    canary: CanaryPendingLifecycle,
    reason: ContentSwitchReason
  ): CanaryOutcome {
    const restoredVersion = canary.previousVersion ?? this.bundleInfo.getBundleVersion();
    const failedVersion = canary.version;

    this.store.save({
      ...state,
      installedVersion: restoredVersion,
      ignoreList: sameVersion(failedVersion, restoredVersion)
        ? state.ignoreList
        : withVersion(state.ignoreList, failedVersion),
      versionHistory: withoutVersion(state.versionHistory, failedVersion),
      lifecycle: { phase: "idle" }
    });

    this.logger.warn(`[hot-updates] Rolled back ${failedVersion} to ${restoredVersion}; ${failedVersion} is now ignored.`);
    this.emit(reason, restoredVersion, false);
    return { status: "rolled_back", failedVersion, installedVersion: restoredVersion };
  }

  private async removeBackupRoot(): Promise<void> {
    try {
      await removePath(backupRootPath(this.layout));
    } catch (error) {
      this.logger.warn("[hot-updates] Could not remove backup content; it is removed on next launch.", error);
    }
  }

  private emit(reason: ContentSwitchReason, version: Version, canaryPending: boolean): void {
    try {
      this.notifier.notify({
        reason,
        version,
        activeRootPath: activeRootPath(this.layout),
        canaryPending,
        at: this.now().toISOString()
      });
    } catch (error) {
      this.logger.error("[hot-updates] Content switch listener failed.", error);
    }
  }
}
