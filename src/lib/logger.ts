import pino from "pino";
import { config, isDev } from "@/config";

export const logger = pino({
  level: config.LOG_LEVEL,
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      }
    : undefined,
});

// Child loggers for modules
export const createLogger = (module: string) => logger.child({ module });

export const httpLogger = createLogger("http");
export const dbLogger = createLogger("db");
