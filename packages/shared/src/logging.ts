import pino from "pino";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === "test";
const isDev = nodeEnv !== "production" && !isTest;

/**
 * Pretty, colorized output in development; one JSON object per line in production.
 * Test runs stay quiet unless LOG_LEVEL asks otherwise.
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Logger bound to one extraction job, used by the worker and the job runner.
 */
export function createJobLogger(jobId: string): pino.Logger {
  return createLogger({ component: "extraction", correlationId: jobId });
}

export { baseLogger as logger };

export type { Logger } from "pino";
