import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

const LEVELS: readonly pino.Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // stdout and file
  const level = LEVELS.find((l) => l === LOG_LEVEL) ?? "info";
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

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  // Credentials travel through call sites; never let them reach a log line
  redact: {
    paths: [
      "credential.accessToken",
      "credential.refreshToken",
      "headers.authorization",
      "*.accessToken",
      "*.refreshToken",
    ],
    censor: "[redacted]",
  },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// For Fastify: export config that Fastify can use directly
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level: LOG_LEVEL, stream: destination }
    : { level: LOG_LEVEL };

// Child loggers for different modules
export const railLogger = logger.child({ module: "rail" });
export const syncLogger = logger.child({ module: "sync" });
export const dbLogger = logger.child({ module: "database" });
export const serverLogger = logger.child({ module: "server" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
