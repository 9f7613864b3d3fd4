import { toErrorMessage } from "./errors.js";
import type { CanaryOutcome, ContentSwitchEvent, HotUpdateLogger, Version } from "./types.js";

export interface WatchdogTimerHandle {
  unref?: () => void;
}

type SetTimeoutFn = (handler: () => void, timeoutMs: number) => WatchdogTimerHandle;
type ClearTimeoutFn = (handle: WatchdogTimerHandle) => void;

export interface CanaryWatchdogDependencies {
  subscribe: (listener: (event: ContentSwitchEvent) => void) => () => void;
  getCanaryVersion: () => Version | null;
  reportFailure: (version: Version) => Promise<CanaryOutcome>;
  timeoutMs: number;
  logger?: HotUpdateLogger;
  setTimeoutFn?: SetTimeoutFn;
  clearTimeoutFn?: ClearTimeoutFn;
}

export interface CanaryWatchdogHandle {
  armedVersion: () => Version | null;
  dispose: () => void;
}

const defaultSetTimeout: SetTimeoutFn = (handler, timeoutMs) => setTimeout(handler, timeoutMs);
function isNodeTimeout(handle: WatchdogTimerHandle): handle is NodeJS.Timeout {
  return "hasRef" in handle && "refresh" in handle;
}

const defaultClearTimeout: ClearTimeoutFn = (handle) => {
  if (isNodeTimeout(handle)) {
    clearTimeout(handle);
  }
};

/**
 * Rolls back content that was switched to but never confirmed within `timeoutMs`.
 * Each content switch re-arms or clears the timer.
 */
export function createCanaryWatchdog(deps: CanaryWatchdogDependencies): CanaryWatchdogHandle {
  const setTimeoutFn = deps.setTimeoutFn ?? defaultSetTimeout;
  const clearTimeoutFn = deps.clearTimeoutFn ?? defaultClearTimeout;
  const logger = deps.logger ?? console;
  let timer: WatchdogTimerHandle | null = null;
  let armed: Version | null = null;

  const disarm = () => {
    if (timer) {
      clearTimeoutFn(timer);
    }
    timer = null;
    armed = null;
  };

  const fire = async (version: Version) => {
    timer = null;
    armed = null;
    if (deps.getCanaryVersion() !== version) {
      return;
    }

    logger.warn(`[hot-updates-canary] Version ${version} was not confirmed in ${deps.timeoutMs}ms; rolling back.`);
    try {
      await deps.reportFailure(version);
    } catch (error) {
      logger.error(`[hot-updates-canary] Rollback of ${version} failed: ${toErrorMessage(error)}`);
    }
  };

  const unsubscribe = deps.subscribe((event) => {
    disarm();
    if (!event.canaryPending) {
      return;
    }

    armed = event.version;
    timer = setTimeoutFn(() => {
      void fire(event.version);
    }, deps.timeoutMs);
    if (typeof timer.unref === "function") {
      timer.unref();
    }
  });

  return {
    armedVersion: () => armed,
    dispose: () => {
      disarm();
      unsubscribe();
    }
  };
}
