import { Router } from "express";
import type { ConfigSnapshot } from "#types/appConfig";
import { getProviderStatus, isDegraded } from "#server/components/ServiceRegistry";

export function createConfigRouter(snapshot: ConfigSnapshot): Router {
  const configRouter = Router();

  // Credentials never leave the process; providers only report their presence.
  configRouter.get("/config/status", (_req, res) => {
    res.json({
      providers: getProviderStatus(snapshot),
      degraded: isDegraded(snapshot),
      timeoutSeconds: snapshot.timeoutSeconds,
      maxRetries: snapshot.maxRetries,
      storagePath: snapshot.storagePath,
      allowedOrigins: snapshot.allowedOrigins,
      developmentMode: snapshot.developmentMode,
    });
  });

  return configRouter;
}
