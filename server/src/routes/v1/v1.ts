import { Router as ExpressRouter } from "express";
import { z } from "zod";
import type { TextGenerationService } from "#server/components/TextGenerationService";
import { getErrorMessage } from "#server/components/Utils";
import { logger } from "#server/components/Logger";

const generateBody = z.object({
  prompt: z.string().trim().min(1),
  provider: z.string().optional(),
});

export function createV1Router(textGeneration: TextGenerationService): ExpressRouter {
  const v1Router = ExpressRouter();

  v1Router.post("/v1/generate", async (req, res) => {
    const parsed = generateBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Request body must contain a non-empty 'prompt' string." });
      return;
    }

    try {
      const result = await textGeneration.generate(parsed.data);
      if ("error" in result) {
        res.status(result.status).json({ error: result.error });
        return;
      }
      res.json(result);
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`Text generation request failed: ${message}`);
      res.status(500).json({ error: "Text generation failed." });
    }
  });

  return v1Router;
}
