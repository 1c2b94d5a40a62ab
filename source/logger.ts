import { join } from "node:path";
import pino from "pino";
import { config } from "./config.ts";

// Lazily created so that importing the library never touches the log directory
let loggerInstance: pino.Logger | null = null;

function createLogger(): pino.Logger {
  if (process.env["NODE_ENV"] === "test") {
    return pino({
      level: "silent",
      enabled: false,
    });
  }

  return pino(
    {
      level: process.env["LOG_LEVEL"] ?? "debug",
      formatters: {
        level: (label) => {
          return { level: label.toUpperCase() };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.transport({
      target: "pino-roll",
      options: {
        file: join(config.app.ensurePathSync("logs"), "ctx-budget.log"),
        size: "10m",
        symlink: true,
        limit: {
          count: 3,
        },
        mkdir: true,
      },
    }),
  );
}

function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export const logger = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    return getLogger()[prop as keyof pino.Logger];
  },
});
