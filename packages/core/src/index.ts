export { ClubhouseError, isClubhouseError } from "./errors.js";
export { AsyncLock } from "./async-lock.js";
export { systemClock, ManualClock, toTimestamp, toEpochSeconds } from "./clock.js";
export {
  createConsoleLogger,
  silentLogger,
  LOG_LEVELS,
  type ConsoleLoggerOptions,
} from "./logger.js";
export { loadServiceConfig, SessionServiceConfigSchema } from "./config.js";
