import express, { type Express } from "express";
import cors from "cors";
import type { ConfigSnapshot } from "#types/appConfig";
import { WILDCARD_ORIGIN } from "#server/components/config/ConfigStore";
import { createHttpLogger } from "#server/components/Logger";
import { TextGenerationService } from "#server/components/TextGenerationService";
import { createHealthRouter } from "./routes/health/healthRoutes.js";
import { createConfigRouter } from "./routes/config/configRoutes.js";
import { createPropertyRouter } from "./routes/property/propertyRoutes.js";
import adminRouter from "./routes/admin/adminRoutes.js";
import { createV1Router } from "./routes/v1/v1.js";

type AppOptions = {
  textGeneration?: TextGenerationService;
};

/**
 * Builds the Express application around one configuration snapshot.
 */
export function createApp(snapshot: ConfigSnapshot, options: AppOptions = {}): Express {
  const textGeneration = options.textGeneration ?? new TextGenerationService(snapshot);

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(
    cors({
      origin: snapshot.allowedOrigins.includes(WILDCARD_ORIGIN) ? true : [...snapshot.allowedOrigins],
    }),
  );
  app.use(createHttpLogger());

  app.use(createHealthRouter(snapshot, textGeneration));
  app.use(createConfigRouter(snapshot));
  app.use(createPropertyRouter(snapshot));
  app.use(adminRouter);
  app.use(createV1Router(textGeneration));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
