import { describe, expect, it, vi } from "vitest";

import { HttpManifestSource, parseUpdateManifest } from "../../server/hotUpdates/manifest.js";

const MANIFEST_URL = "https://updates.test/channel/latest.json";

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

describe("update manifest", () => {
  it("resolves relative archive urls against the manifest", () => {
    expect(parseUpdateManifest({ version: " 2.0.0 ", url: "bundles/2.0.0.zip" }, MANIFEST_URL)).toEqual({
      version: "2.0.0",
      url: "https://updates.test/channel/bundles/2.0.0.zip"
    });
    expect(parseUpdateManifest({ version: "2.0.0", url: "https://cdn.test/a.zip" }, MANIFEST_URL).url).toBe(
      "https://cdn.test/a.zip"
    );
  });

  it("names the invalid field", () => {
    expect(() => parseUpdateManifest({ version: "", url: "a.zip" }, MANIFEST_URL)).toThrow(
      'Update manifest is invalid at "version".'
    );
    expect(() => parseUpdateManifest("nope", MANIFEST_URL)).toThrow('Update manifest is invalid at "".');
  });

  it("fetches and parses the latest manifest", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ version: "2.1.0", url: "2.1.0.zip" }));
    const source = new HttpManifestSource({ manifestUrl: MANIFEST_URL, timeoutMs: 5_000, fetchFn });

    await expect(source.fetchLatest()).resolves.toEqual({
      version: "2.1.0",
      url: "https://updates.test/channel/2.1.0.zip"
    });
    expect(fetchFn).toHaveBeenCalledWith(MANIFEST_URL, expect.objectContaining({ method: "GET" }));
  });

  it("reports unavailable manifests", async () => {
    const notConfigured = new HttpManifestSource({ manifestUrl: " ", timeoutMs: 5_000, fetchFn: vi.fn<typeof fetch>() });
    await expect(notConfigured.fetchLatest()).rejects.toMatchObject({ code: "MANIFEST_UNAVAILABLE" });

    const failing = new HttpManifestSource({
      manifestUrl: MANIFEST_URL,
      timeoutMs: 5_000,
      fetchFn: vi.fn<typeof fetch>(async () => jsonResponse({ error: "down" }, 500))
    });
    await expect(failing.fetchLatest()).rejects.toMatchObject({
      code: "MANIFEST_UNAVAILABLE",
      message: "Update manifest returned HTTP 500."
    });

    const offline = new HttpManifestSource({
      manifestUrl: MANIFEST_URL,
      timeoutMs: 5_000,
      fetchFn: vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      })
    });
    await expect(offline.fetchLatest()).rejects.toMatchObject({
      code: "MANIFEST_UNAVAILABLE",
      message: "Update manifest lookup failed: fetch failed"
    });
  });
});
