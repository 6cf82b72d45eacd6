import { pino, type Logger, type LoggerOptions } from "pino";
import { pinoHttp, type HttpLogger } from "pino-http";
import { LOG_LEVELS, type LogLevel } from "#types/appConfig";

const isLogLevel = (level: string): level is LogLevel => LOG_LEVELS.some((candidate) => candidate === level);

const initialLevel = process.env.LOG_LEVEL ?? "info";

export class PinoLogger {
  private static instance: Logger | undefined;
  private static options: LoggerOptions = {
    level: isLogLevel(initialLevel) ? initialLevel : "info",
    // Only use pino-pretty in development; production keeps JSON lines.
    transport:
      process.env.NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
  };

  private constructor() {}

  public static getLogger(): Logger {
    if (!PinoLogger.instance) {
      PinoLogger.instance = pino(PinoLogger.options);
    }
    return PinoLogger.instance;
  }

  /**
   * Dynamically change the log level of the current logger instance
   */
  public static setLogLevel(level: string): void {
    if (!isLogLevel(level)) {
      throw new Error(`Invalid log level: ${level}. Valid levels: ${LOG_LEVELS.join(", ")}`);
    }

    if (PinoLogger.instance) {
      PinoLogger.instance.level = level;
    }
    // Also update the stored options for future instances
    PinoLogger.options.level = level;
  }

  public static getCurrentLogLevel(): string {
    if (PinoLogger.instance) {
      return PinoLogger.instance.level;
    }
    return PinoLogger.options.level || "info";
  }
}

export const logger = PinoLogger.getLogger();

/**
 * Request/response logging middleware. Server errors log at error, client
 * errors at warn, the rest at info. Health polls from the dashboard go to debug.
 */
export const createHttpLogger = (): HttpLogger =>
  pinoHttp({
    logger: PinoLogger.getLogger(),
    customLogLevel: (req, res, err) => {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      if (req.url === "/health") return "debug";
      return "info";
    },
  });
