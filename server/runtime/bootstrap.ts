import { toErrorMessage } from "../hotUpdates/errors.js";
import type { CheckOutcome, HotUpdateLogger, RecoveryReport } from "../hotUpdates/types.js";

export interface SchedulerTimerHandle {
  unref?: () => void;
}

type SetIntervalFn = (handler: () => void, timeoutMs: number) => SchedulerTimerHandle;
type ClearIntervalFn = (handle: SchedulerTimerHandle) => void;

export interface HotUpdateBootstrapDependencies {
  launchRecovery: () => Promise<RecoveryReport>;
  checkForUpdates: () => Promise<CheckOutcome>;
  enablePeriodicCheck: boolean;
  checkIntervalMs: number;
  logger?: HotUpdateLogger;
  setIntervalFn?: SetIntervalFn;
  clearIntervalFn?: ClearIntervalFn;
}

export interface HotUpdateBootstrapHandle {
  recovery: RecoveryReport | null;
  runCheck: () => Promise<CheckOutcome | null>;
  dispose: () => void;
}

function isNodeTimeout(handle: SchedulerTimerHandle): handle is NodeJS.Timeout {
  return "hasRef" in handle && "refresh" in handle;
}

const defaultSetInterval: SetIntervalFn = (handler, timeoutMs) => setInterval(handler, timeoutMs);
const defaultClearInterval: ClearIntervalFn = (handle) => {
  if (isNodeTimeout(handle)) {
    clearInterval(handle);
  }
};

export async function initializeHotUpdateBootstrap(
  deps: HotUpdateBootstrapDependencies
): Promise<HotUpdateBootstrapHandle> {
  const setIntervalFn = deps.setIntervalFn ?? defaultSetInterval;
  const clearIntervalFn = deps.clearIntervalFn ?? defaultClearInterval;
  const logger = deps.logger ?? console;
  let checkHandle: SchedulerTimerHandle | null = null;
  let checkInFlight = false;

  let recovery: RecoveryReport | null = null;
  try {
    recovery = await deps.launchRecovery();
    logger.info(
      `[hot-updates-bootstrap] Launch recovery finished: ${recovery.installedVersion} (${recovery.phase}), ${recovery.actions.length} action(s).`
    );
  } catch (error) {
    logger.error(`[hot-updates-bootstrap] Launch recovery failed: ${toErrorMessage(error)}`);
  }

  const runCheck = async (): Promise<CheckOutcome | null> => {
    if (checkInFlight) {
      return null;
    }

    checkInFlight = true;
    try {
      const outcome = await deps.checkForUpdates();
      logger.info(`[hot-updates-bootstrap] Update check: ${outcome.status} (${outcome.remoteVersion}).`);
      return outcome;
    } catch (error) {
      logger.warn(`[hot-updates-bootstrap] Update check failed: ${toErrorMessage(error)}`);
      return null;
    } finally {
      checkInFlight = false;
    }
  };

  if (deps.enablePeriodicCheck) {
    await runCheck();
    checkHandle = setIntervalFn(() => {
      void runCheck();
    }, deps.checkIntervalMs);

    if (typeof checkHandle.unref === "function") {
      checkHandle.unref();
    }
  }

  return {
    recovery,
    runCheck,
    dispose: () => {
      if (!checkHandle) {
        return;
      }

      clearIntervalFn(checkHandle);
      checkHandle = null;
    }
  };
}
