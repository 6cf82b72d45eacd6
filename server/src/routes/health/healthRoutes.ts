import { Router } from "express";
import type { ConfigSnapshot } from "#types/appConfig";
import type { ValidationReport } from "#types/validation";
import { validateConfig } from "#server/components/config/ConfigValidator";
import { enabledServices, getProviderStatus, isDegraded } from "#server/components/ServiceRegistry";
import type { ProviderCheck, TextGenerationService } from "#server/components/TextGenerationService";
import { getErrorMessage } from "#server/components/Utils";
import { logger } from "#server/components/Logger";

/**
 * `degraded` always means no text provider can serve requests, the same
 * condition `/config/status` reports; other findings are `warnings`.
 */
export type HealthStatus = "healthy" | "warnings" | "degraded";

export function healthStatus(snapshot: ConfigSnapshot, report: ValidationReport): HealthStatus {
  if (isDegraded(snapshot)) return "degraded";
  return report.overallPass ? "healthy" : "warnings";
}

export function deepHealthStatus(checks: readonly ProviderCheck[]): HealthStatus {
  const working = checks.filter((check) => check.ok).length;
  if (working === 0) return "degraded";
  return working === checks.length ? "healthy" : "warnings";
}

/**
 * Health endpoints polled by the dashboard. Both always answer 200 and carry
 * their verdict in `status`.
 */
export function createHealthRouter(snapshot: ConfigSnapshot, textGeneration: TextGenerationService): Router {
  const healthRouter = Router();

  healthRouter.get("/health", (_req, res) => {
    try {
      const validation = validateConfig(snapshot);
      res.json({
        status: healthStatus(snapshot, validation),
        timestamp: new Date().toISOString(),
        validation,
        services: enabledServices(snapshot),
        providers: getProviderStatus(snapshot),
      });
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`Failed to build health report: ${message}`);
      res.status(500).json({ error: "Failed to build health report." });
    }
  });

  // Makes live provider calls; not meant for frequent polling.
  healthRouter.get("/health/deep", async (_req, res) => {
    try {
      const checks = await textGeneration.checkProviders();
      res.json({
        status: deepHealthStatus(checks),
        timestamp: new Date().toISOString(),
        checks,
      });
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`Deep health check failed: ${message}`);
      res.status(500).json({ error: "Deep health check failed." });
    }
  });

  return healthRouter;
}
