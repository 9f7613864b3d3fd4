import type { Express } from "express";

import type { LifecyclePhase, Version } from "../../hotUpdates/types.js";

export interface SystemRouteDependencies {
  getVersion?: () => string;
  getContentStatus: () => {
    installedVersion: Version;
    phase: LifecyclePhase;
  };
  getRecoveryStatus?: () => {
    completed: boolean;
    actions: string[];
  };
}

export function registerSystemRoutes(app: Express, deps: SystemRouteDependencies): void {
  app.get("/api/health", (_request, response) => {
    const version = deps.getVersion?.();
    const recovery = deps.getRecoveryStatus?.();
    response.json({
      ok: true,
      now: new Date().toISOString(),
      ...(typeof version === "string" && version.trim().length > 0
        ? {
            version: version.trim()
          }
        : {}),
      content: deps.getContentStatus(),
      ...(recovery
        ? {
            recovery
          }
        : {})
    });
  });
}
