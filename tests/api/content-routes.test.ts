import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  inferMimeType,
  isPathWithinRoot,
  normalizeContentPath,
  registerContentRoutes
} from "../../server/http/routes/content.js";
import { writeFiles } from "../helpers/hotUpdateHarness.js";
import { createRouteHarness, invokeRoute } from "../helpers/routeHarness.js";

const tempDirs: string[] = [];

function setup() {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "hot-updates-content-"));
  tempDirs.push(root);
  const activeRoot = path.join(root, "www");
  writeFiles(activeRoot, {
    "index.html": "<html>active</html>",
    "css/app.css": "body{}",
    "docs/index.html": "<html>docs</html>",
    ".content-version": "2.0.0\n"
  });
  writeFiles(root, { "secret.txt": "outside" });

  let currentRoot = activeRoot;
  const { app, route } = createRouteHarness();
  registerContentRoutes(app as never, {
    getActiveRootPath: () => currentRoot,
    entryFile: "index.html"
  });

  return {
    root,
    activeRoot,
    route,
    switchRoot: (next: string) => {
      currentRoot = next;
    }
  };
}

function bodyText(body: unknown): string {
  return Buffer.isBuffer(body) ? body.toString("utf8") : "";
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("content routes", () => {
  it("serves the entry file for the content root and directories", async () => {
    const { route } = setup();

    const rootResponse = await invokeRoute(route("GET", "/app"));
    expect(rootResponse.statusCode).toBe(200);
    expect(bodyText(rootResponse.body)).toBe("<html>active</html>");
    expect(rootResponse.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(rootResponse.headers["cache-control"]).toBe("no-store");
    expect(rootResponse.headers["content-length"]).toBe("19");

    const docsResponse = await invokeRoute(route("GET", "/app/*"), { params: { "0": "docs/" } });
    expect(bodyText(docsResponse.body)).toBe("<html>docs</html>");
  });

  it("serves nested assets with their mime type", async () => {
    const { route } = setup();

    const response = await invokeRoute(route("GET", "/app/*"), { params: { "0": "css/app.css" } });
    expect(response.statusCode).toBe(200);
    expect(bodyText(response.body)).toBe("body{}");
    expect(response.headers["content-type"]).toBe("text/css; charset=utf-8");
  });

  it("follows the active root after a content switch", async () => {
    const { root, route, switchRoot } = setup();
    const nextRoot = path.join(root, "www-next");
    writeFiles(nextRoot, { "index.html": "<html>next</html>" });

    switchRoot(nextRoot);
    const response = await invokeRoute(route("GET", "/app"));
    expect(bodyText(response.body)).toBe("<html>next</html>");
  });

  it("rejects traversal, hidden files and missing paths", async () => {
    const { route } = setup();

    const traversal = await invokeRoute(route("GET", "/app/*"), { params: { "0": "../secret.txt" } });
    expect(traversal.statusCode).toBe(400);
    expect(traversal.body).toEqual({ code: "BAD_REQUEST", message: "Path escapes the content root." });

    const encoded = await invokeRoute(route("GET", "/app/*"), { params: { "0": "%2e%2e/secret.txt" } });
    expect(encoded.statusCode).toBe(400);

    const malformed = await invokeRoute(route("GET", "/app/*"), { params: { "0": "%E0%A4%A" } });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.body).toEqual({ code: "BAD_REQUEST", message: "Malformed path." });

    const marker = await invokeRoute(route("GET", "/app/*"), { params: { "0": ".content-version" } });
    expect(marker.statusCode).toBe(404);

    const missing = await invokeRoute(route("GET", "/app/*"), { params: { "0": "missing.js" } });
    expect(missing.statusCode).toBe(404);
    expect(missing.body).toEqual({ code: "NOT_FOUND", message: "Not found." });
  });

  it("refuses symlinks that leave the content root", async () => {
    const { root, activeRoot, route } = setup();
    fs.symlinkSync(path.join(root, "secret.txt"), path.join(activeRoot, "linked.txt"));

    const response = await invokeRoute(route("GET", "/app/*"), { params: { "0": "linked.txt" } });
    expect(response.statusCode).toBe(400);
    expect(response.body).toEqual({ code: "BAD_REQUEST", message: "Path escapes the content root." });
  });
});

describe("content route failures", () => {
  it("answers unexpected errors with a generic payload", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { app, route } = createRouteHarness();
    registerContentRoutes(app as never, {
      getActiveRootPath: () => {
        throw new Error("state unavailable");
      },
      entryFile: "index.html"
    });

    const response = await invokeRoute(route("GET", "/app"));
    expect(response.statusCode).toBe(500);
    expect(response.body).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
    expect(consoleError).toHaveBeenCalledWith("[content-route-error]", expect.any(Error));
  });
});

describe("content path helpers", () => {
  it("normalizes request paths", () => {
    expect(normalizeContentPath("/css//app.css")).toBe("css/app.css");
    expect(normalizeContentPath("./docs/./index.html")).toBe("docs/index.html");
    expect(normalizeContentPath("")).toBe("");
  });

  it("checks containment and mime types", () => {
    expect(isPathWithinRoot("/data/www", "/data/www/css/app.css")).toBe(true);
    expect(isPathWithinRoot("/data/www", "/data/www_previous/index.html")).toBe(false);
    expect(inferMimeType("bundle.JS")).toBe("text/javascript; charset=utf-8");
    expect(inferMimeType("font.woff2")).toBe("font/woff2");
    expect(inferMimeType("archive.bin")).toBe("application/octet-stream");
  });
});
