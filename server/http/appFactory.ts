import express from "express";

import {
  createApiAuthMiddleware,
  createCorsMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware
} from "./middleware.js";
import { registerContentRoutes, type ContentRouteDependencies } from "./routes/content.js";
import { registerHotUpdateRoutes, type HotUpdateRouteDependencies } from "./routes/hotUpdates.js";
import { registerSystemRoutes, type SystemRouteDependencies } from "./routes/system.js";

export interface AppFactoryDependencies {
  apiAuthToken: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  system: SystemRouteDependencies;
  hotUpdates: HotUpdateRouteDependencies;
  content: ContentRouteDependencies;
}

export function createApp(deps: AppFactoryDependencies): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: deps.allowedCorsOrigins,
      allowAnyOrigin: deps.allowAnyCorsOrigin
    })
  );
  app.use(express.json({ limit: "256kb" }));
  app.use(createApiAuthMiddleware(deps.apiAuthToken));

  registerSystemRoutes(app, deps.system);
  registerHotUpdateRoutes(app, deps.hotUpdates);
  registerContentRoutes(app, deps.content);

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware());

  return app;
}
