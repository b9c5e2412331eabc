import pino from "pino";

const isDev = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

export const logger = pino({
  name: "task-router",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          singleLine: true,
        },
      }
    : undefined,
  level: process.env.LOG_LEVEL ?? "info",
});

export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
