import cors from "cors";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual } from "node:crypto";

type Middleware = (request: Request, response: Response, next: NextFunction) => void;

const SECURITY_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ["X-Content-Type-Options", "nosniff"],
  // Hosts embed the content server in their own webview frame.
  ["X-Frame-Options", "SAMEORIGIN"],
  ["Referrer-Policy", "no-referrer"]
];

const PROTECTED_PREFIX = "/api/";

function readHeader(request: Request, name: string): string {
  const value = request.headers[name];
  return typeof value === "string" ? value.trim() : "";
}

function readRequestToken(request: Request): string {
  const authorization = readHeader(request, "authorization");
  const bearer = /^bearer\s+(.+)$/i.exec(authorization);
  if (bearer?.[1]) {
    return bearer[1].trim();
  }
  return authorization || readHeader(request, "x-api-token");
}

function tokensMatch(candidate: string, expected: string): boolean {
  const candidateBytes = Buffer.from(candidate);
  const expectedBytes = Buffer.from(expected);
  return candidateBytes.length === expectedBytes.length && timingSafeEqual(candidateBytes, expectedBytes);
}

export function createSecurityHeadersMiddleware(): Middleware {
  return (_request, response, next) => {
    for (const [name, value] of SECURITY_HEADERS) {
      response.setHeader(name, value);
    }
    next();
  };
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowAnyOrigin: boolean;
}

export function createCorsMiddleware(config: CorsConfig) {
  const allowed = new Set(config.allowedOrigins);
  return cors({
    origin: (origin, callback) => {
      callback(null, !origin || config.allowAnyOrigin || allowed.has(origin));
    },
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-token"],
    credentials: false,
    maxAge: 600
  });
}

export interface ApiAuthMiddlewareOptions {
  publicPaths?: string[];
}

/**
 * Guards the bridge API with a shared token. An empty token leaves the API open,
 * which is how a host running the service on loopback without auth is configured.
 */
export function createApiAuthMiddleware(apiAuthToken: string, options: ApiAuthMiddlewareOptions = {}): Middleware {
  const expected = apiAuthToken.trim();
  const publicPaths = new Set(["/api/health", ...(options.publicPaths ?? [])]);

  return (request, response, next) => {
    const exempt =
      expected.length === 0 ||
      request.method === "OPTIONS" ||
      !request.path.startsWith(PROTECTED_PREFIX) ||
      publicPaths.has(request.path);
    if (exempt) {
      next();
      return;
    }

    const candidate = readRequestToken(request);
    if (candidate.length === 0 || !tokensMatch(candidate, expected)) {
      response.status(401).json({ code: "UNAUTHORIZED", message: "Unauthorized" });
      return;
    }

    next();
  };
}

export function createNotFoundMiddleware(): (request: Request, response: Response) => void {
  return (_request, response) => {
    response.status(404).json({ code: "NOT_FOUND", message: "Not found" });
  };
}

function bodyParserFailure(error: unknown): string | null {
  if (typeof error !== "object" || error === null || !("type" in error) || typeof error.type !== "string") {
    return null;
  }
  switch (error.type) {
    case "entity.parse.failed":
      return "Request body is not valid JSON.";
    case "entity.too.large":
      return "Request body is too large.";
    default:
      return null;
  }
}

export function createErrorMiddleware(): (
  error: unknown,
  request: Request,
  response: Response,
  next: NextFunction
) => void {
  return (error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    const bodyFailure = bodyParserFailure(error);
    if (bodyFailure) {
      response.status(400).json({ code: "UPDATE_DATA_REQUIRED", message: bodyFailure });
      return;
    }

    console.error("[unhandled-api-error]", error);
    response.status(500).json({ code: "INTERNAL_ERROR", message: "Internal server error" });
  };
}
