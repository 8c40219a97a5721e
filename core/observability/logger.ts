import pino from "pino";

export type { Logger } from "pino";

export const logger = pino(
  {
    level: process.env.HOSTPILOT_LOG_LEVEL || "info",
    base: undefined,
    redact: ["apiKey", "*.apiKey", "headers.authorization"]
  },
  pino.destination(2)
);
