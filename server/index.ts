import { createApp } from "./http/appFactory.js";
import { createCanaryWatchdog } from "./hotUpdates/canaryWatchdog.js";
import { StaticBundleInfo } from "./hotUpdates/bundleInfo.js";
import { resolveHotUpdateConfig } from "./hotUpdates/config.js";
import { createContentLayout } from "./hotUpdates/contentRoots.js";
import { UnzipArchiveExtractor } from "./hotUpdates/extractor.js";
import { HttpArchiveFetcher } from "./hotUpdates/fetcher.js";
import { UpdateLifecycleManager } from "./hotUpdates/manager.js";
import { HttpManifestSource } from "./hotUpdates/manifest.js";
import { ContentSwitchBroadcaster } from "./hotUpdates/notifier.js";
import { HotUpdateStateStore } from "./hotUpdates/state.js";
import { initializeHotUpdateBootstrap } from "./runtime/bootstrap.js";

const config = resolveHotUpdateConfig(process.env);
const bundleInfo = new StaticBundleInfo(config.bundleVersion, config.bundleDir);
const broadcaster = new ContentSwitchBroadcaster();

const manager = new UpdateLifecycleManager({
  layout: createContentLayout(config.dataDir, config.bundleDir),
  stateStore: new HotUpdateStateStore(config.statePath, { bundleVersion: bundleInfo.getBundleVersion() }),
  bundleInfo,
  fetcher: new HttpArchiveFetcher({ idleTimeoutMs: config.downloadTimeoutMs }),
  extractor: new UnzipArchiveExtractor({ unzipBinary: config.unzipBinary, timeoutMs: config.extractTimeoutMs }),
  notifier: broadcaster,
  manifestSource:
    config.manifestUrl.length > 0
      ? new HttpManifestSource({ manifestUrl: config.manifestUrl, timeoutMs: config.manifestTimeoutMs })
      : undefined,
  entryFile: config.entryFile,
  autoDownload: config.autoDownload
});

const watchdog = createCanaryWatchdog({
  subscribe: (listener) => broadcaster.subscribe(listener),
  getCanaryVersion: () => manager.getVersionInfo().canaryVersion,
  reportFailure: (version) => manager.reportCanary({ version, success: false }),
  timeoutMs: config.canaryTimeoutMs
});

const bootstrap = await initializeHotUpdateBootstrap({
  launchRecovery: () => manager.launchRecovery(),
  checkForUpdates: () => manager.checkForUpdates(),
  enablePeriodicCheck: config.autoCheck && config.manifestUrl.length > 0,
  checkIntervalMs: config.checkIntervalMs
});

const app = createApp({
  apiAuthToken: config.authToken,
  allowedCorsOrigins: config.corsOrigins,
  allowAnyCorsOrigin: config.allowAnyCorsOrigin,
  system: {
    getVersion: () => process.env.npm_package_version ?? "dev",
    getContentStatus: () => {
      const info = manager.getVersionInfo();
      return { installedVersion: info.installedVersion, phase: info.phase };
    },
    getRecoveryStatus: () => ({
      completed: bootstrap.recovery !== null,
      actions: bootstrap.recovery?.actions ?? []
    })
  },
  hotUpdates: {
    manager,
    events: broadcaster,
    enableDebugApi: config.enableDebugApi,
    getPublicConfig: () => ({
      appBundleVersion: bundleInfo.getBundleVersion(),
      entryFile: config.entryFile,
      autoCheck: config.autoCheck,
      autoDownload: config.autoDownload,
      checkIntervalMs: config.checkIntervalMs,
      canaryTimeoutMs: config.canaryTimeoutMs,
      manifestConfigured: config.manifestUrl.length > 0,
      debugApiEnabled: config.enableDebugApi
    })
  },
  content: {
    getActiveRootPath: () => manager.getActiveRootPath(),
    entryFile: config.entryFile
  }
});

const server = app.listen(config.port, config.host, () => {
  console.log(`Hot content update service listening on http://${config.host}:${config.port}`);
});

const shutdown = (signal: string) => {
  console.log(`[hot-updates] ${signal} received, shutting down.`);
  bootstrap.dispose();
  watchdog.dispose();
  server.close();
};

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
