import type { Express, Request, Response } from "express";
import { ZodError } from "zod";

import { HotUpdateError, toErrorPayload } from "../../hotUpdates/errors.js";
import type { CancelDownloadResult, UpdateLifecycleManager } from "../../hotUpdates/manager.js";
import type { DownloadProgressListener, ContentSwitchListener } from "../../hotUpdates/notifier.js";
import {
  parseCanaryReport,
  parseUpdateAvailableEvent,
  parseVersionRequest,
  requireVersion
} from "../../hotUpdates/requests.js";
import type { ContentSwitchEvent, DownloadProgress, Version } from "../../hotUpdates/types.js";

export type HotUpdateRouteManager = Pick<
  UpdateLifecycleManager,
  | "getCurrentVersion"
  | "getVersionInfo"
  | "getPendingUpdateInfo"
  | "getIgnoreList"
  | "getVersionHistory"
  | "checkAvailable"
  | "checkForUpdates"
  | "downloadUpdate"
  | "cancelDownload"
  | "install"
  | "reportCanary"
  | "rollback"
  | "addToIgnoreList"
  | "removeFromIgnoreList"
  | "clearIgnoreList"
>;

export interface HotUpdatePublicConfig {
  appBundleVersion: Version;
  entryFile: string;
  autoCheck: boolean;
  autoDownload: boolean;
  checkIntervalMs: number;
  canaryTimeoutMs: number;
  manifestConfigured: boolean;
  debugApiEnabled: boolean;
}

export interface HotUpdateEventSource {
  subscribe: (listener: ContentSwitchListener) => () => void;
  subscribeProgress: (listener: DownloadProgressListener) => () => void;
  publishProgress: (version: Version, progress: DownloadProgress) => void;
  getLastEvent: () => ContentSwitchEvent | null;
}

export interface HotUpdateRouteDependencies {
  manager: HotUpdateRouteManager;
  events: HotUpdateEventSource;
  getPublicConfig: () => HotUpdatePublicConfig;
  enableDebugApi: boolean;
  heartbeatIntervalMs?: number;
}

const ROUTE_PREFIX = "/api/hot-updates";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstParam(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    return value[0];
  }
  return "";
}

function writeSseEvent(response: Response, event: string, payload: object): void {
  response.write(`event: ${event}\n`);
  response.write(`data: ${JSON.stringify(payload)}\n\n`);
}

export function sendHotUpdateError(response: Response, error: unknown): void {
  if (error instanceof HotUpdateError) {
    response.status(error.statusCode).json(toErrorPayload(error));
    return;
  }

  if (error instanceof ZodError) {
    response.status(400).json({
      code: "UPDATE_DATA_REQUIRED",
      message: error.issues[0]?.message ?? "Invalid update data."
    });
    return;
  }

  console.error("[hot-updates-api-error]", error);
  response.status(500).json({
    code: "INTERNAL_ERROR",
    message: "Internal server error"
  });
}

export function registerHotUpdateRoutes(app: Express, deps: HotUpdateRouteDependencies): void {
  app.get(`${ROUTE_PREFIX}/version`, (_request: Request, response: Response) => {
    try {
      response.json({ version: deps.manager.getCurrentVersion() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.get(`${ROUTE_PREFIX}/info`, (_request: Request, response: Response) => {
    try {
      response.json({ info: deps.manager.getVersionInfo() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.get(`${ROUTE_PREFIX}/pending`, (_request: Request, response: Response) => {
    try {
      response.json({ pending: deps.manager.getPendingUpdateInfo() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.get(`${ROUTE_PREFIX}/config`, (_request: Request, response: Response) => {
    response.json({ config: deps.getPublicConfig() });
  });

  app.get(`${ROUTE_PREFIX}/ignore-list`, (_request: Request, response: Response) => {
    try {
      response.json({ ignoreList: deps.manager.getIgnoreList() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.get(`${ROUTE_PREFIX}/history`, (_request: Request, response: Response) => {
    try {
      response.json({ versionHistory: deps.manager.getVersionHistory() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.post(`${ROUTE_PREFIX}/check`, async (request: Request, response: Response) => {
    try {
      const body: unknown = request.body;
      const event = isRecord(body) && body.version !== undefined ? parseUpdateAvailableEvent(body) : null;
      const outcome = event
        ? await deps.manager.checkAvailable(event, (progress) => {
            deps.events.publishProgress(event.version, progress);
          })
        : await deps.manager.checkForUpdates();
      response.json({ outcome });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.post(`${ROUTE_PREFIX}/download`, async (request: Request, response: Response) => {
    try {
      const body: unknown = request.body;
      const progressVersion = isRecord(body) && typeof body.version === "string" ? body.version.trim() : "";
      const outcome = await deps.manager.downloadUpdate(body, (progress) => {
        deps.events.publishProgress(progressVersion, progress);
      });
      response.json({ outcome });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.post(`${ROUTE_PREFIX}/download/cancel`, (_request: Request, response: Response) => {
    try {
      const result: CancelDownloadResult = deps.manager.cancelDownload();
      response.json({ result });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.post(`${ROUTE_PREFIX}/install`, async (_request: Request, response: Response) => {
    try {
      response.json({ result: await deps.manager.install() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.post(`${ROUTE_PREFIX}/canary`, async (request: Request, response: Response) => {
    try {
      response.json({ outcome: await deps.manager.reportCanary(parseCanaryReport(request.body)) });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.post(`${ROUTE_PREFIX}/rollback`, async (_request: Request, response: Response) => {
    try {
      response.json({ outcome: await deps.manager.rollback() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.get(`${ROUTE_PREFIX}/events`, (request: Request, response: Response) => {
    response.status(200);
    response.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    response.setHeader("Cache-Control", "no-cache, no-transform");
    response.setHeader("Connection", "keep-alive");
    response.setHeader("X-Accel-Buffering", "no");
    response.flushHeaders?.();

    let closed = false;
    const unsubscribeSwitch = deps.events.subscribe((event) => {
      writeSseEvent(response, "content-switch", event);
    });
    const unsubscribeProgress = deps.events.subscribeProgress((event) => {
      writeSseEvent(response, "download-progress", event);
    });
    const heartbeatTimer = setInterval(() => {
      writeSseEvent(response, "heartbeat", { at: new Date().toISOString() });
    }, deps.heartbeatIntervalMs ?? 15_000);

    const closeStream = () => {
      if (closed) {
        return;
      }
      closed = true;
      clearInterval(heartbeatTimer);
      unsubscribeSwitch();
      unsubscribeProgress();
      response.end();
    };

    writeSseEvent(response, "ready", {
      info: deps.manager.getVersionInfo(),
      lastSwitch: deps.events.getLastEvent(),
      at: new Date().toISOString()
    });

    request.on("close", closeStream);
  });

  if (!deps.enableDebugApi) {
    return;
  }

  app.post(`${ROUTE_PREFIX}/ignore-list`, async (request: Request, response: Response) => {
    try {
      const version = parseVersionRequest(request.body);
      response.json({ ignoreList: await deps.manager.addToIgnoreList(version) });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.delete(`${ROUTE_PREFIX}/ignore-list/:version`, async (request: Request, response: Response) => {
    try {
      const version = requireVersion(firstParam(request.params.version));
      response.json({ ignoreList: await deps.manager.removeFromIgnoreList(version) });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });

  app.delete(`${ROUTE_PREFIX}/ignore-list`, async (_request: Request, response: Response) => {
    try {
      response.json({ ignoreList: await deps.manager.clearIgnoreList() });
    } catch (error) {
      sendHotUpdateError(response, error);
    }
  });
}
