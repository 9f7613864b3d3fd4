export type Version = string;

export type HotUpdateErrorCode =
  | "URL_REQUIRED"
  | "UPDATE_DATA_REQUIRED"
  | "VERSION_REQUIRED"
  | "DOWNLOAD_IN_PROGRESS"
  | "DOWNLOAD_FAILED"
  | "HTTP_ERROR"
  | "TEMP_DIR_ERROR"
  | "EXTRACTION_FAILED"
  | "WWW_NOT_FOUND"
  | "NO_UPDATE_READY"
  | "UPDATE_FILES_NOT_FOUND"
  | "INSTALL_FAILED"
  | "CANARY_PENDING"
  | "ROLLBACK_UNAVAILABLE"
  | "VERSION_INSTALLED"
  | "VERSION_REJECTED"
  | "MANIFEST_UNAVAILABLE";

export interface IdleLifecycle {
  phase: "idle";
}

export interface DownloadingLifecycle {
  phase: "downloading";
  version: Version;
  startedAt: string;
}

export interface StagedLifecycle {
  phase: "staged";
  version: Version;
  stagedAt: string;
}

export interface CanaryPendingLifecycle {
  phase: "canary_pending";
  version: Version;
  previousVersion: Version | null;
  activatedAt: string;
}

export type LifecycleState = IdleLifecycle | DownloadingLifecycle | StagedLifecycle | CanaryPendingLifecycle;

export type LifecyclePhase = LifecycleState["phase"];

export interface HotUpdateStateSnapshot {
  schemaVersion: 1;
  bundleVersion: Version;
  installedVersion: Version;
  lifecycle: LifecycleState;
  ignoreList: Version[];
  versionHistory: Version[];
  updatedAt: string;
}

export interface VersionInfo {
  installedVersion: Version;
  appBundleVersion: Version;
  pendingVersion: Version | null;
  previousVersion: Version | null;
  canaryVersion: Version | null;
  hasPendingUpdate: boolean;
  pendingUpdateReady: boolean;
  downloadInProgress: boolean;
  phase: LifecyclePhase;
  ignoreList: Version[];
  versionHistory: Version[];
}

export interface PendingUpdateInfo {
  hasPendingUpdate: boolean;
  pendingVersion: Version | null;
  installedVersion: Version;
  appBundleVersion: Version;
  message: string;
}

export interface UpdateAvailableEvent {
  version: Version;
  url?: string;
}

export type CheckOutcome =
  | { status: "up_to_date"; installedVersion: Version; remoteVersion: Version }
  | { status: "ignored"; remoteVersion: Version }
  | { status: "already_staged"; remoteVersion: Version }
  | { status: "canary_pending"; remoteVersion: Version; canaryVersion: Version }
  | { status: "downloading"; remoteVersion: Version; pendingVersion: Version }
  | { status: "available"; remoteVersion: Version; url?: string }
  | { status: "staged"; remoteVersion: Version };

export type DownloadOutcome =
  | { status: "staged"; version: Version }
  | { status: "already_installed"; version: Version }
  | { status: "already_staged"; version: Version }
  | { status: "cancelled"; version: Version };

export interface InstallOutcome {
  installedVersion: Version;
  previousVersion: Version | null;
  activeRootPath: string;
}

export type CanaryOutcome =
  | { status: "committed"; version: Version }
  | { status: "rolled_back"; failedVersion: Version; installedVersion: Version }
  | { status: "not_pending"; version: Version };

export interface RecoveryReport {
  phase: LifecyclePhase;
  installedVersion: Version;
  actions: string[];
}

export interface CanaryReport {
  version: Version;
  success: boolean;
}

export interface DownloadProgress {
  receivedBytes: number;
  totalBytes: number | null;
  percent: number | null;
}

export type ProgressListener = (progress: DownloadProgress) => void;

export interface ArchiveFetchOptions {
  tempDir: string;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface ArchiveFetcher {
  fetch(url: string, options: ArchiveFetchOptions): Promise<string>;
}

export interface ArchiveExtractor {
  extract(archivePath: string, destinationPath: string): Promise<void>;
}

export interface BundleInfoProvider {
  getBundleVersion(): Version;
  getBundleContentPath(): string;
}

export interface UpdateManifest {
  version: Version;
  url: string;
}

export interface UpdateManifestSource {
  fetchLatest(signal?: AbortSignal): Promise<UpdateManifest>;
}

export type ContentSwitchReason = "install" | "rollback" | "recovery" | "reset";

export interface ContentSwitchEvent {
  reason: ContentSwitchReason;
  version: Version;
  activeRootPath: string;
  canaryPending: boolean;
  at: string;
}

export interface ContentSwitchNotifier {
  notify(event: ContentSwitchEvent): void;
}

export type HotUpdateLogger = Pick<Console, "info" | "warn" | "error">;
