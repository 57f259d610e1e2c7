import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

type StreamLevel = (typeof LEVELS)[number];

function isStreamLevel(value: string): value is StreamLevel {
  return LEVELS.some((level) => level === value);
}

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const level: StreamLevel = isStreamLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

  // stdout and file
  const streams: pino.StreamEntry[] = [
    { level, stream: process.stdout },
    {
      level,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// For Fastify: config it can take directly
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level: LOG_LEVEL, stream: destination }
    : { level: LOG_LEVEL };

// Child loggers for different modules
export const odkLogger = logger.child({ module: "odk-api" });
export const dbLogger = logger.child({ module: "database" });
export const storageLogger = logger.child({ module: "storage" });
export const syncLogger = logger.child({ module: "sync" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}

/**
 * Message of an unknown thrown value, for log lines and history rows
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
