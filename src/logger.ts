import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

type LogLevel = (typeof LEVELS)[number];

// Unknown levels fall back to info instead of making pino throw at startup
function readLevel(value: string | undefined): LogLevel {
  const level = LEVELS.find((candidate) => candidate === value?.trim().toLowerCase());
  return level ?? "info";
}

const LOG_LEVEL = readLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// stdout only, unless LOG_FILE asks for a copy of every run on disk
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  if (LOG_LEVEL === "silent") {
    return pino.destination({ dest: LOG_FILE, sync: false });
  }

  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL, stream: process.stdout },
    { level: LOG_LEVEL, stream: pino.destination({ dest: LOG_FILE, sync: false }) },
  ];

  return pino.multistream(streams) as DestinationStream;
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { service: "roster-sync" },
  // credentials travel in settings and request headers
  redact: {
    paths: ["auth.password", "auth.token", "headers.Authorization", "password", "token"],
    censor: "[redacted]",
  },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers, one per stage of a run
export const loaderLogger = logger.child({ module: "loader" });
export const mapperLogger = logger.child({ module: "mapper" });
export const remoteLogger = logger.child({ module: "remote" });
export const syncLogger = logger.child({ module: "sync" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info({ logFile: LOG_FILE, logLevel: LOG_LEVEL }, "Writing run logs to file");
}
