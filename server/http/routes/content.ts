import fs from "node:fs/promises";
import path from "node:path";
import type { Express, Request, Response } from "express";

export interface ContentRouteDependencies {
  getActiveRootPath: () => string;
  entryFile: string;
}

type ContentErrorCode = "BAD_REQUEST" | "NOT_FOUND";

const CONTENT_ERROR_STATUS: Record<ContentErrorCode, number> = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404
};

class ContentRouteError extends Error {
  readonly statusCode: number;

  constructor(
    readonly code: ContentErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ContentRouteError";
    this.statusCode = CONTENT_ERROR_STATUS[code];
  }
}

function normalizeForComparison(value: string): string {
  const resolved = path.resolve(value);
  const normalized = process.platform === "win32" ? resolved.toLowerCase() : resolved;
  return normalized.replace(/[\\/]+$/, "");
}

export function isPathWithinRoot(rootPath: string, candidatePath: string): boolean {
  const root = normalizeForComparison(rootPath);
  const candidate = normalizeForComparison(candidatePath);
  if (candidate === root) {
    return true;
  }

  const rootPrefix = `${root}${path.sep}`;
  return candidate.startsWith(rootPrefix);
}

export function normalizeContentPath(raw: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(raw);
  } catch {
    throw new ContentRouteError("BAD_REQUEST", "Malformed path.");
  }

  const segments = decoded
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".");

  for (const segment of segments) {
    if (segment === ".." || segment.includes("\0")) {
      throw new ContentRouteError("BAD_REQUEST", "Path escapes the content root.");
    }
    if (segment.startsWith(".")) {
      throw new ContentRouteError("NOT_FOUND", "Not found.");
    }
  }

  return segments.join("/");
}

function resolvePathWithinRoot(rootPath: string, relativePath: string): string {
  const resolvedRoot = path.resolve(rootPath);
  const candidate = relativePath.length > 0 ? path.resolve(resolvedRoot, ...relativePath.split("/")) : resolvedRoot;

  if (!isPathWithinRoot(resolvedRoot, candidate)) {
    throw new ContentRouteError("BAD_REQUEST", "Path escapes the content root.");
  }

  return candidate;
}

async function assertRealPathInsideRoot(rootPath: string, candidatePath: string): Promise<void> {
  const rootRealPath = await fs.realpath(path.resolve(rootPath));
  const candidateRealPath = await fs.realpath(candidatePath);
  if (!isPathWithinRoot(rootRealPath, candidateRealPath)) {
    throw new ContentRouteError("BAD_REQUEST", "Path escapes the content root.");
  }
}

export function inferMimeType(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case ".html":
    case ".htm":
      return "text/html; charset=utf-8";
    case ".js":
    case ".mjs":
      return "text/javascript; charset=utf-8";
    case ".css":
      return "text/css; charset=utf-8";
    case ".json":
    case ".map":
      return "application/json; charset=utf-8";
    case ".png":
      return "image/png";
    case ".jpg":
    case ".jpeg":
      return "image/jpeg";
    case ".gif":
      return "image/gif";
    case ".svg":
      return "image/svg+xml";
    case ".webp":
      return "image/webp";
    case ".ico":
      return "image/x-icon";
    case ".woff":
      return "font/woff";
    case ".woff2":
      return "font/woff2";
    case ".ttf":
      return "font/ttf";
    case ".wasm":
      return "application/wasm";
    case ".mp3":
      return "audio/mpeg";
    case ".mp4":
      return "video/mp4";
    case ".xml":
      return "application/xml";
    case ".txt":
      return "text/plain; charset=utf-8";
    default:
      return "application/octet-stream";
  }
}

function isMissingPathError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

async function resolveServedFile(rootPath: string, relativePath: string, entryFile: string): Promise<string> {
  let targetPath = resolvePathWithinRoot(rootPath, relativePath);

  try {
    await assertRealPathInsideRoot(rootPath, targetPath);
    let stats = await fs.lstat(targetPath);
    if (stats.isDirectory()) {
      targetPath = path.join(targetPath, entryFile);
      stats = await fs.lstat(targetPath);
    }
    if (stats.isSymbolicLink() || !stats.isFile()) {
      throw new ContentRouteError("NOT_FOUND", "Not found.");
    }
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new ContentRouteError("NOT_FOUND", "Not found.");
    }
    throw error;
  }

  return targetPath;
}

export function registerContentRoutes(app: Express, deps: ContentRouteDependencies): void {
  const serve = async (request: Request, response: Response) => {
    try {
      const rawPath = typeof request.params[0] === "string" ? request.params[0] : "";
      const relativePath = normalizeContentPath(rawPath);
      const filePath = await resolveServedFile(deps.getActiveRootPath(), relativePath, deps.entryFile);
      const content = await fs.readFile(filePath);

      response.setHeader("Content-Type", inferMimeType(filePath));
      response.setHeader("Content-Length", String(content.length));
      response.setHeader("Cache-Control", "no-store");
      response.status(200).send(content);
    } catch (error) {
      if (error instanceof ContentRouteError) {
        response.status(error.statusCode).json({ code: error.code, message: error.message });
        return;
      }

      console.error("[content-route-error]", error);
      response.status(500).json({ code: "INTERNAL_ERROR", message: "Internal server error" });
    }
  };

  app.get("/app", serve);
  app.get("/app/*", serve);
}
