import makeLogger, { pinoLogger } from "./logger";

export { default as makeLogger } from "./logger";
export type { LogData, LogLevel, Logger, LogMethod } from "./types";
export { pinoLogger };
export const logger = makeLogger();
