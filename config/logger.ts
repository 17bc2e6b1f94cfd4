import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTestRun = process.env.NODE_TEST_CONTEXT !== undefined;

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return isTestRun ? "silent" : "info";
}

export const logger = pino({
  name: "campaign-insights",
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
  level: resolveLevel(),
});

export type { Logger } from "pino";
