import pino from "pino";
import { getConfig } from "./config.js";

export const SERVICE_NAME = "fnrecall";
export const SERVICE_VERSION = "0.1.0";

const config = getConfig();

export const logger = pino(
  {
    level: config.LOG_LEVEL,
    base: {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      environment: config.NODE_ENV,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  // stdout is reserved for command output
  pino.destination(2),
);
