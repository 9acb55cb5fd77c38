import pino, { type Logger } from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTestRun = process.env.NODE_ENV === "test" || process.env.NODE_TEST_CONTEXT !== undefined;

export const logger = pino({
  name: "cadre",
  transport:
    isDev && !isTestRun
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
  level: process.env.LOG_LEVEL ?? (isTestRun ? "silent" : "info"),
});

export type { Logger };

export function componentLogger(component: string, bindings?: Record<string, unknown>): Logger {
  return logger.child({ component, ...bindings });
}
