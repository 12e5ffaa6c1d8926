export { withRetry } from "./retry";
export type { RetryOptions } from "./retry";
export {
  MonitorError,
  NetworkError,
  ApiError,
  DeliveryError,
  ConfigError,
  classifyError,
  isTransientError,
  errorMessage,
} from "./errors";
export { createLogger, logger } from "./logger";
export type { Logger, LoggerOptions } from "./logger";
