// Core
export { AsyncQueue } from "./queue/AsyncQueue";
export type { QueueOptions, ItemHook } from "./queue/AsyncQueue";

// Building blocks
export { BoundedQueue } from "./queue/BoundedQueue";
export { PendingRegistry } from "./queue/PendingRegistry";
export type { PendingHandle, RegisterOptions } from "./queue/PendingRegistry";

// Errors
export {
  QueueError,
  InvalidArgumentError,
  QueueClosedError,
  QueueEmptyError,
  QueueCancelledError,
  QueueTimeoutError,
  isQueueError,
  isAbortError,
} from "./errors";
export type { QueueErrorCode } from "./errors";

// Types
export type { QueueEventMap } from "./types/QueueEvents";

// Metrics
export { QueueMetrics } from "./metrics/metrics";
export type { QueueMetricsSnapshot } from "./metrics/metrics";

// Logging
export { logger, createLogger } from "./utils/logger";
export type { Logger, LoggerConfig } from "./utils/logger";
