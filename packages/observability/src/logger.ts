import pino from "pino";
import type { LoggerOptions } from "pino";

export type Logger = pino.Logger;
export type PinoLoggerOptions = LoggerOptions;

export interface LoggerParams {
  env: string;
  level: string;
  service: string;
}

export function createPinoOptions(params: LoggerParams): PinoLoggerOptions {
  return {
    level: params.level,
    base: {
      env: params.env,
      service: params.service,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Log calls pass failures as `{ error }`; pino only serializes `err` by default.
    serializers: {
      error: pino.stdSerializers.err,
    },
  };
}

export function createLogger(params: LoggerParams): Logger {
  return pino(createPinoOptions(params));
}

export function createSilentLogger(service = "test"): Logger {
  return createLogger({ env: "test", level: "silent", service });
}
