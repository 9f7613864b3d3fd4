import { describe, expect, it } from "vitest";

import {
  parseCanaryReport,
  parseDownloadRequest,
  parseUpdateAvailableEvent,
  parseVersionRequest,
  requireVersion
} from "../../server/hotUpdates/requests.js";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw.");
}

describe("hot update request parsing", () => {
  it("trims download requests", () => {
    expect(parseDownloadRequest({ url: " https://updates.test/a.zip ", version: " 2.0.0 " })).toEqual({
      url: "https://updates.test/a.zip",
      version: "2.0.0"
    });
  });

  it("maps validation failures to error codes", () => {
    expect(captureError(() => parseDownloadRequest(null))).toMatchObject({ code: "UPDATE_DATA_REQUIRED" });
    expect(captureError(() => parseDownloadRequest(["a"]))).toMatchObject({ code: "UPDATE_DATA_REQUIRED" });
    expect(captureError(() => parseDownloadRequest({ version: "2.0.0", url: "  " }))).toMatchObject({ code: "URL_REQUIRED" });
    expect(captureError(() => parseDownloadRequest({}))).toMatchObject({ code: "URL_REQUIRED" });
    expect(captureError(() => parseDownloadRequest({ url: "https://updates.test/a.zip", version: 3 }))).toMatchObject({ code: "VERSION_REQUIRED" });
  });

  it("accepts update events with or without a url", () => {
    expect(parseUpdateAvailableEvent({ version: "2.0.0" })).toEqual({ version: "2.0.0" });
    expect(parseUpdateAvailableEvent({ version: "2.0.0", url: "https://updates.test/a.zip" })).toEqual({
      version: "2.0.0",
      url: "https://updates.test/a.zip"
    });
  });

  it("defaults canary reports to success", () => {
    expect(parseCanaryReport({ version: "2.0.0" })).toEqual({ version: "2.0.0", success: true });
    expect(parseCanaryReport({ version: "2.0.0", success: false })).toEqual({ version: "2.0.0", success: false });
    expect(captureError(() => parseCanaryReport({ success: false }))).toMatchObject({ code: "VERSION_REQUIRED" });
  });

  it("requires non-empty versions", () => {
    expect(parseVersionRequest({ version: "3.0.0" })).toBe("3.0.0");
    expect(requireVersion(" 3.0.0 ")).toBe("3.0.0");
    expect(captureError(() => requireVersion(""))).toMatchObject({ code: "VERSION_REQUIRED" });
    expect(captureError(() => requireVersion(undefined))).toMatchObject({ code: "VERSION_REQUIRED" });
  });
});
