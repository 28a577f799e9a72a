import pino from "pino";
import { LOG_LEVEL, PROJECT_NAME } from "../config/constants";

export const logger = pino({
  name: PROJECT_NAME,
  level: LOG_LEVEL,
  redact: ["connectionString", "descriptor", "*.connectionString"],
});

export type Logger = typeof logger;
