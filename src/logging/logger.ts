import type { FastifyBaseLogger } from "fastify";
import { pino } from "pino";

/** The pino logger Fastify hands out (`app.log` and its children). */
export type Logger = FastifyBaseLogger;

export const debugEnabled = process.env.DIMMER_DEBUG === "1";

export function logLevel(): string {
  return process.env.LOG_LEVEL ?? (debugEnabled ? "debug" : "info");
}

export const silentLogger: Logger = pino({ enabled: false });
