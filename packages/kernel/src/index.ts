// @keyrelay/kernel: configuration, logging, timeouts and graceful shutdown

// Configuration
export {
  ConfigManager,
  ConfigSchema,
  ProxyConfigSchema,
  ExecutorConfigSchema,
  InferenceConfigSchema,
  LoggingConfigSchema,
  assertProxyConfigured,
  createConfigManager,
  loadEnvConfig,
  type Config,
  type ConfigInput,
  type ProxyConfig,
  type ExecutorConfig,
  type InferenceConfig,
  type LoggingConfig,
} from "./config.js";

// Logging
export {
  initLogger,
  createLogger,
  shutdownLogger,
  type Logger,
  type LogContext,
  type CreateLoggerOptions,
} from "./logger.js";

// Timeouts
export {
  TimeoutError,
  withTimeout,
  createTimeoutController,
  Deadline,
  type TimeoutController,
} from "./timeout.js";

// Graceful Shutdown
export {
  createShutdownManager,
  createDrainHandler,
  SHUTDOWN_PRIORITIES,
  type ShutdownManager,
  type ShutdownHandler,
  type ShutdownOptions,
} from "./shutdown.js";
