import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  createContentLayout,
  resolveContentRoots,
  stagingPathFor,
  toStagingDirName
} from "../../server/hotUpdates/contentRoots.js";
import { createDefaultState } from "../../server/hotUpdates/state.js";

const layout = createContentLayout("/var/app/data", "/opt/app/www");
const at = "2026-03-01T10:00:00.000Z";

describe("content root resolver", () => {
  it("resolves only the active root while idle", () => {
    expect(resolveContentRoots(createDefaultState("1.0.0"), layout)).toEqual({
      active: path.join("/var/app/data", "www"),
      staging: null,
      backup: null,
      bundle: "/opt/app/www",
      temp: path.join("/var/app/data", "tmp")
    });
  });

  it("exposes the staging root of a staged version", () => {
    const roots = resolveContentRoots(
      { ...createDefaultState("1.0.0"), lifecycle: { phase: "staged", version: "1.2.0", stagedAt: at } },
      layout
    );
    expect(roots.staging).toBe(path.join("/var/app/data", "staging", "1.2.0"));
    expect(roots.backup).toBeNull();
  });

  it("exposes the backup root while a canary is pending", () => {
    const roots = resolveContentRoots(
      {
        ...createDefaultState("1.0.0"),
        installedVersion: "1.2.0",
        lifecycle: { phase: "canary_pending", version: "1.2.0", previousVersion: "1.0.0", activatedAt: at }
      },
      layout
    );
    expect(roots.backup).toBe(path.join("/var/app/data", "www_previous"));
    expect(roots.staging).toBeNull();
  });

  it("keeps staging directory names inside the staging parent", () => {
    expect(toStagingDirName("1.2.0-beta+7")).toBe("1.2.0-beta_7");
    expect(toStagingDirName("../../etc")).toBe("__.._etc");
    expect(toStagingDirName("   ")).toBe("_");
    expect(path.dirname(stagingPathFor(layout, "../x"))).toBe(path.join("/var/app/data", "staging"));
  });
});
