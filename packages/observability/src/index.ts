export { createLogger, createPinoOptions, createSilentLogger } from "./logger.js";
export type { Logger, LoggerParams, PinoLoggerOptions } from "./logger.js";
