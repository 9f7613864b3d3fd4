import { describe, expect, it, vi } from "vitest";

import {
  createApiAuthMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware
} from "../../server/http/middleware.js";
import { registerSystemRoutes } from "../../server/http/routes/system.js";
import { createMockResponse, createRouteHarness, invokeRoute } from "../helpers/routeHarness.js";

function runAuth(
  middleware: ReturnType<typeof createApiAuthMiddleware>,
  request: { path: string; method?: string; headers?: Record<string, string> }
) {
  const response = createMockResponse();
  let nextCalled = false;
  middleware(
    {
      method: "GET",
      headers: {},
      ...request
    } as never,
    response as never,
    () => {
      nextCalled = true;
    }
  );
  return { response, nextCalled };
}

describe("System and Auth Routes", () => {
  it("returns the health payload with content and recovery status", async () => {
    const { app, route } = createRouteHarness();
    registerSystemRoutes(app as never, {
      getVersion: () => " 0.1.0 ",
      getContentStatus: () => ({ installedVersion: "2.0.0", phase: "canary_pending" }),
      getRecoveryStatus: () => ({ completed: true, actions: ["installed pending update 2.0.0"] })
    });

    const response = await invokeRoute(route("GET", "/api/health"), { path: "/api/health" });
    expect(response.statusCode).toBe(200);
    expect(response.body).toEqual({
      ok: true,
      now: expect.any(String),
      version: "0.1.0",
      content: { installedVersion: "2.0.0", phase: "canary_pending" },
      recovery: { completed: true, actions: ["installed pending update 2.0.0"] }
    });
  });

  it("omits optional health fields that are not provided", async () => {
    const { app, route } = createRouteHarness();
    registerSystemRoutes(app as never, {
      getContentStatus: () => ({ installedVersion: "1.0.0", phase: "idle" })
    });

    const response = await invokeRoute(route("GET", "/api/health"), { path: "/api/health" });
    expect(response.body).toEqual({
      ok: true,
      now: expect.any(String),
      content: { installedVersion: "1.0.0", phase: "idle" }
    });
  });

  it("keeps /api/health and content public and protects the hot update api", () => {
    const middleware = createApiAuthMiddleware("test-secret");

    expect(runAuth(middleware, { path: "/api/health" }).nextCalled).toBe(true);
    expect(runAuth(middleware, { path: "/app/index.html" }).nextCalled).toBe(true);
    expect(runAuth(middleware, { path: "/api/hot-updates/install", method: "OPTIONS" }).nextCalled).toBe(true);

    const unauthorized = runAuth(middleware, { path: "/api/hot-updates/info" });
    expect(unauthorized.nextCalled).toBe(false);
    expect(unauthorized.response.statusCode).toBe(401);
    expect(unauthorized.response.body).toEqual({ code: "UNAUTHORIZED", message: "Unauthorized" });

    const wrongToken = runAuth(middleware, {
      path: "/api/hot-updates/info",
      headers: { authorization: "Bearer test-secret-2" }
    });
    expect(wrongToken.nextCalled).toBe(false);

    expect(
      runAuth(middleware, { path: "/api/hot-updates/info", headers: { authorization: "Bearer test-secret" } })
        .nextCalled
    ).toBe(true);
    expect(
      runAuth(middleware, { path: "/api/hot-updates/info", headers: { "x-api-token": " test-secret " } }).nextCalled
    ).toBe(true);
  });

  it("allows extra public paths and an empty token", () => {
    const withPublicPath = createApiAuthMiddleware("test-secret", { publicPaths: ["/api/hot-updates/version"] });
    expect(runAuth(withPublicPath, { path: "/api/hot-updates/version" }).nextCalled).toBe(true);

    const open = createApiAuthMiddleware("  ");
    expect(runAuth(open, { path: "/api/hot-updates/info" }).nextCalled).toBe(true);
  });

  it("sets security headers and maps fallthrough errors", () => {
    const headersMiddleware = createSecurityHeadersMiddleware();
    const headerResponse = createMockResponse();
    let nextCalled = false;
    headersMiddleware({ path: "/app" } as never, headerResponse as never, () => {
      nextCalled = true;
    });
    expect(nextCalled).toBe(true);
    expect(headerResponse.getHeader("x-content-type-options")).toBe("nosniff");
    expect(headerResponse.getHeader("x-frame-options")).toBe("SAMEORIGIN");
    expect(headerResponse.getHeader("referrer-policy")).toBe("no-referrer");

    const notFoundResponse = createMockResponse();
    createNotFoundMiddleware()({} as never, notFoundResponse as never);
    expect(notFoundResponse.statusCode).toBe(404);
    expect(notFoundResponse.body).toEqual({ code: "NOT_FOUND", message: "Not found" });

    const errorMiddleware = createErrorMiddleware();
    const parseResponse = createMockResponse();
    errorMiddleware({ type: "entity.parse.failed" }, {} as never, parseResponse as never, () => undefined);
    expect(parseResponse.statusCode).toBe(400);
    expect(parseResponse.body).toEqual({ code: "UPDATE_DATA_REQUIRED", message: "Request body is not valid JSON." });

    const largeResponse = createMockResponse();
    errorMiddleware({ type: "entity.too.large" }, {} as never, largeResponse as never, () => undefined);
    expect(largeResponse.statusCode).toBe(400);
    expect(largeResponse.body).toEqual({ code: "UPDATE_DATA_REQUIRED", message: "Request body is too large." });

    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const crashResponse = createMockResponse();
    errorMiddleware(new Error("boom"), {} as never, crashResponse as never, () => undefined);
    expect(crashResponse.statusCode).toBe(500);
    expect(crashResponse.body).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
    expect(consoleError).toHaveBeenCalledWith("[unhandled-api-error]", expect.any(Error));
  });
});
