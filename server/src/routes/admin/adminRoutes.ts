import { Router } from "express";
import { z } from "zod";
import { PinoLogger, logger } from "#server/components/Logger";
import { getErrorMessage } from "#server/components/Utils";

const setLevelBody = z.object({ level: z.string().min(1) });

const adminRouter = Router();

adminRouter.get("/admin/logging/level", (_req, res) => {
  res.json({ level: PinoLogger.getCurrentLogLevel() });
});

adminRouter.post("/admin/logging/level", (req, res) => {
  const parsed = setLevelBody.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: "Log level is required and must be a string." });
    return;
  }

  const { level } = parsed.data;
  try {
    PinoLogger.setLogLevel(level);
    logger.info(`Log level changed to: ${level}`);
    res.json({ message: `Log level successfully changed to ${level}`, level });
  } catch (error) {
    const message = getErrorMessage(error);
    logger.error(`Failed to set log level: ${message}`);
    res.status(400).json({ error: message });
  }
});

export default adminRouter;
