import pino from "pino";
import { validateLoggerEnv } from "./config";

export type Logger = pino.Logger;

/**
 * Creates a pino logger tagged with the library name. Pass the result to
 * `Service`, `Executor` or `Group` to route their logs.
 */
export function createLogger(options: pino.LoggerOptions = {}): Logger {
  return pino({
    name: "stepwire",
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}

const env = validateLoggerEnv(process.env);

/**
 * Logger used when none is injected. Created once at module load with the
 * level from `STEPWIRE_LOG_LEVEL`; its level may be changed in place
 * (`defaultLogger.level = "debug"`) but the instance is never swapped.
 */
export const defaultLogger: Logger = createLogger({
  level: env.STEPWIRE_LOG_LEVEL,
});
