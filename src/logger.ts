import pino from "pino";
import type { PipelineConfig } from "./config.js";

export function createLogger(config: Pick<PipelineConfig, "LOG_LEVEL">) {
  return pino({
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
