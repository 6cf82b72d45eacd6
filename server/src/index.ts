import "dotenv/config";
import yargs from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "#server/components/config/ConfigStore";
import { logConfigStatus, validateConfig } from "#server/components/config/ConfigValidator";
import { isDegraded } from "#server/components/ServiceRegistry";
import { logger, PinoLogger } from "#server/components/Logger";
import { createApp } from "./app.js";

async function main() {
  // --- 1. Argument Parsing ---
  const argv = await yargs(hideBin(process.argv))
    .option("port", {
      alias: "p",
      type: "number",
      description: "Port to listen on (overrides PORT)",
    })
    .option("loglevel", {
      alias: "l",
      type: "string",
      description: "Logging level (trace, debug, info, warn, error, fatal)",
    })
    .parse();

  // --- 2. Configuration Snapshot ---
  const snapshot = loadConfig(process.env);

  const logLevel = argv.loglevel ?? snapshot.logLevel;
  PinoLogger.setLogLevel(logLevel);
  logger.info(`Log level set to: ${logLevel}${argv.loglevel ? " (from CLI)" : " (from environment)"}`);

  const report = validateConfig(snapshot);
  logConfigStatus(snapshot, report, logger);
  if (isDegraded(snapshot)) {
    logger.warn("No text-generation provider is usable; running in degraded mode");
  }

  // --- 3. Express Server Setup ---
  const app = createApp(snapshot);
  const port = argv.port ?? snapshot.port;
  const server = app.listen(port, () => {
    logger.info(`Property intelligence API listening on port ${port}`);
  });

  // --- Graceful Shutdown ---
  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    server.close(() => {
      logger.info("HTTP server closed.");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));
}

// Run the main function and catch any top-level errors.
main().catch((error) => {
  logger.fatal(error, "Failed to start the application");
  process.exit(1);
});
