export type { ToolgateConfig, SafetyMode, OverflowPolicy, LogLevel, LogFormat, ConfigSource } from "./config/types.js";
export {
  DEFAULT_CONFIG,
  LOG_FORMATS,
  LOG_LEVELS,
  OVERFLOW_POLICIES,
  SAFETY_MODES,
  mergeConfig,
  validateConfig,
} from "./config/schema.js";
export {
  ENV_KEYS,
  getConfigValue,
  loadConfig,
  setConfigValue,
  type LoadOptions,
  type LoadResult,
} from "./config/loader.js";

export {
  Logger,
  createLogger,
  jsonOutput,
  outputForFormat,
  prettyOutput,
  silentLogger,
  type LogEntry,
  type LogOutput,
} from "./logging/logger.js";

export {
  ArgumentEncodingError,
  RegistryLockedError,
  ToolAlreadyRegisteredError,
  ToolCancelledError,
  ToolTimeoutError,
  errorMessage,
  isCancellation,
} from "./errors/errors.js";

export type { ConcurrencyMode, Tool, ToolContext, ToolDefinitionInput, ToolHandler } from "./tools/types.js";
export { ToolRegistry } from "./tools/registry.js";
export { defineTool, describeToolCall, formatToolName } from "./tools/define-tool.js";

export {
  ApprovalGate,
  NO_APPROVAL_HANDLER,
  REJECTED_BY_USER,
  type ApprovalDecision,
  type ApprovalHandler,
  type ApprovalPolicy,
  type ApprovalRequest,
} from "./approval/approval-gate.js";
export {
  ApprovalQueue,
  DEFAULT_APPROVAL_TIMEOUT_MS,
  DEFAULT_MAX_SETTLED,
  type ApprovalQueueOptions,
  type ApprovalStatus,
  type PendingApproval,
} from "./approval/approval-queue.js";

export { raceAbort, neverAborted } from "./execution/abort.js";
export { encodeArguments } from "./execution/arguments.js";
export {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  withRetry,
  type RetryHooks,
  type RetryNotice,
  type RetryPolicy,
} from "./execution/retry.js";
export { createCallScope, withCallScope, type CallScope } from "./execution/timeout.js";

export { formatToolResult } from "./format/result-formatter.js";

export {
  DEFAULT_EVENT_CAPACITY,
  EventStream,
  type EventStreamOptions,
  type ToolEventInput,
} from "./events/event-stream.js";
export { EventRecorder, filterEvents, isEventOfType, type EventOfType } from "./events/helpers.js";

export { ToolDispatcher, DEFAULT_CONVERSATION_ID } from "./dispatcher/dispatcher.js";
export { Semaphore } from "./dispatcher/semaphore.js";
export type { ToolCallInfo, ToolLifecycleHooks } from "./dispatcher/hooks.js";
export type {
  BatchResult,
  CallOutcome,
  DeniedOutcome,
  DispatcherOptions,
  DispatcherSettings,
  ExecuteOptions,
  FailedOutcome,
  NotFoundOutcome,
  ParallelSettings,
  SucceededOutcome,
} from "./dispatcher/types.js";
export { createDispatcher, dispatcherOptionsFromConfig, type CreateDispatcherDeps } from "./factory.js";
