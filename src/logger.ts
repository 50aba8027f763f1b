import "dotenv/config";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE ?? "";

function isLevel(value: string): value is pino.Level {
  return ["fatal", "error", "warn", "info", "debug", "trace"].includes(value);
}

/**
 * stdout plus LOG_FILE, when one is set. The file's directory is created on
 * first write.
 */
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === "") {
    return undefined;
  }

  const level: pino.Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";
  return pino.multistream([
    { level, stream: process.stdout },
    {
      level,
      stream: pino.destination({ dest: LOG_FILE, mkdir: true, sync: false }),
    },
  ]);
}

const destination = createDestination();

const options: LoggerOptions = {
  level: LOG_LEVEL,
  // Connection settings carry credentials
  redact: ["password", "*.password"],
};

export const logger =
  destination !== undefined ? pino(options, destination) : pino(options);

export type Logger = pino.Logger;

export const fastifyLoggerConfig =
  destination !== undefined ? { ...options, stream: destination } : options;

export const sourceLogger = logger.child({ module: "source" });
export const sheetsLogger = logger.child({ module: "sheets" });
export const partnerLogger = logger.child({ module: "partner-api" });
export const syncLogger = logger.child({ module: "sync" });
export const serverLogger = logger.child({ module: "server" });

if (destination !== undefined) {
  logger.info({ logFile: LOG_FILE, logLevel: LOG_LEVEL }, "Logging to file");
}
