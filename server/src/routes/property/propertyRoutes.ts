import { Router } from "express";
import type { ConfigSnapshot } from "#types/appConfig";

export function createPropertyRouter(snapshot: ConfigSnapshot): Router {
  const propertyRouter = Router();

  propertyRouter.get("/api/property/questions", (_req, res) => {
    res.json({ questions: snapshot.presetQuestions });
  });

  return propertyRouter;
}
