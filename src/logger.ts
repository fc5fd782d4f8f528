import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, {
  type DestinationStream,
  type Level,
  type LoggerOptions,
} from "pino";

const LEVELS: readonly Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

function resolveLevel(value: string | undefined): Level {
  return LEVELS.find((level) => level === value) ?? "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

function fileStream(path: string): DestinationStream {
  const dir = dirname(path);
  if (dir !== "." && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return pino.destination({ dest: path, sync: false });
}

/**
 * stdout alone, or stdout plus `LOG_FILE` at the same level
 */
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  return pino.multistream([
    { level: LOG_LEVEL, stream: process.stdout },
    { level: LOG_LEVEL, stream: fileStream(LOG_FILE) },
  ]);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

export const apiLogger = logger.child({ module: "rtp-api" });
export const pipelineLogger = logger.child({ module: "pipeline" });
export const catalogLogger = logger.child({ module: "catalog" });

if (destination !== undefined) {
  logger.debug({ logFile: LOG_FILE, level: LOG_LEVEL }, "Mirroring logs to file");
}
