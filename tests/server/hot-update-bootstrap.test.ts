import { describe, expect, it, vi } from "vitest";

import { initializeHotUpdateBootstrap, type SchedulerTimerHandle } from "../../server/runtime/bootstrap.js";
import type { CheckOutcome, RecoveryReport } from "../../server/hotUpdates/types.js";
import { createDeferred, createQuietLogger } from "../helpers/hotUpdateHarness.js";

const recoveryReport: RecoveryReport = {
  phase: "idle",
  installedVersion: "1.0.0",
  actions: ["initialized content from bundle 1.0.0"]
};

describe("hot update bootstrap", () => {
  it("runs recovery, an initial check and the periodic loop", async () => {
    const calls: string[] = [];
    const schedulerHandle: SchedulerTimerHandle = { unref: vi.fn() };
    const setIntervalFn = vi.fn((_handler: () => void, _timeoutMs: number) => schedulerHandle);
    const clearIntervalFn = vi.fn();

    const handle = await initializeHotUpdateBootstrap({
      launchRecovery: async () => {
        calls.push("recover");
        return recoveryReport;
      },
      checkForUpdates: async (): Promise<CheckOutcome> => {
        calls.push("check");
        return { status: "up_to_date", installedVersion: "1.0.0", remoteVersion: "1.0.0" };
      },
      enablePeriodicCheck: true,
      checkIntervalMs: 300_000,
      logger: createQuietLogger(),
      setIntervalFn,
      clearIntervalFn
    });

    expect(calls).toEqual(["recover", "check"]);
    expect(handle.recovery).toEqual(recoveryReport);
    expect(setIntervalFn).toHaveBeenCalledWith(expect.any(Function), 300_000);
    expect(schedulerHandle.unref).toHaveBeenCalledTimes(1);

    handle.dispose();
    expect(clearIntervalFn).toHaveBeenCalledWith(schedulerHandle);
    handle.dispose();
    expect(clearIntervalFn).toHaveBeenCalledTimes(1);
  });

  it("skips the periodic loop when disabled", async () => {
    const checkForUpdates = vi.fn<() => Promise<CheckOutcome>>();
    const setIntervalFn = vi.fn(() => ({}));

    const handle = await initializeHotUpdateBootstrap({
      launchRecovery: async () => recoveryReport,
      checkForUpdates,
      enablePeriodicCheck: false,
      checkIntervalMs: 300_000,
      logger: createQuietLogger(),
      setIntervalFn
    });

    expect(checkForUpdates).not.toHaveBeenCalled();
    expect(setIntervalFn).not.toHaveBeenCalled();
    handle.dispose();
  });

  it("keeps starting when recovery or checks fail", async () => {
    const logger = createQuietLogger();

    const handle = await initializeHotUpdateBootstrap({
      launchRecovery: async () => {
        throw new Error("disk unavailable");
      },
      checkForUpdates: async () => {
        throw new Error("manifest offline");
      },
      enablePeriodicCheck: true,
      checkIntervalMs: 300_000,
      logger,
      setIntervalFn: () => ({})
    });

    expect(handle.recovery).toBeNull();
    expect(logger.error).toHaveBeenCalledWith("[hot-updates-bootstrap] Launch recovery failed: disk unavailable");
    expect(logger.warn).toHaveBeenCalledWith("[hot-updates-bootstrap] Update check failed: manifest offline");
    await expect(handle.runCheck()).resolves.toBeNull();
  });

  it("does not overlap update checks", async () => {
    const gate = createDeferred();
    const checkForUpdates = vi.fn(async (): Promise<CheckOutcome> => {
      await gate.promise;
      return { status: "available", remoteVersion: "2.0.0", url: "https://updates.test/2.0.0.zip" };
    });

    const handle = await initializeHotUpdateBootstrap({
      launchRecovery: async () => recoveryReport,
      checkForUpdates,
      enablePeriodicCheck: false,
      checkIntervalMs: 300_000,
      logger: createQuietLogger()
    });

    const first = handle.runCheck();
    await expect(handle.runCheck()).resolves.toBeNull();
    gate.resolve();

    await expect(first).resolves.toEqual({
      status: "available",
      remoteVersion: "2.0.0",
      url: "https://updates.test/2.0.0.zip"
    });
    expect(checkForUpdates).toHaveBeenCalledTimes(1);
  });
});
