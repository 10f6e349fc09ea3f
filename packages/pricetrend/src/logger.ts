import { pino } from "pino";
import { logLevelSchema } from "./config.js";

// Only LOG_LEVEL is read here; the rest of the environment is validated when a run is configured.
const level = logLevelSchema.safeParse(process.env.LOG_LEVEL);

export const logger = pino({
  name: "pricetrend",
  level: level.success ? level.data : "info",
});

if (!level.success) {
  logger.warn({ LOG_LEVEL: process.env.LOG_LEVEL }, "unknown LOG_LEVEL, logging at info");
}
