import type { ApprovalHandler } from "./approval/approval-gate.js";
import type { ToolgateConfig } from "./config/types.js";
import { ToolDispatcher } from "./dispatcher/dispatcher.js";
import type { ToolLifecycleHooks } from "./dispatcher/hooks.js";
import type { DispatcherOptions } from "./dispatcher/types.js";
import { EventStream } from "./events/event-stream.js";
import type { Logger } from "./logging/logger.js";
import { createLogger, outputForFormat } from "./logging/logger.js";
import { ToolRegistry } from "./tools/registry.js";

export type CreateDispatcherDeps = {
  registry?: ToolRegistry;
  approvalHandler?: ApprovalHandler;
  hooks?: ToolLifecycleHooks;
  logger?: Logger;
};

/** Maps a loaded config onto dispatcher options. */
export function dispatcherOptionsFromConfig(
  config: ToolgateConfig,
  deps: CreateDispatcherDeps = {},
): DispatcherOptions {
  const logger =
    deps.logger ?? createLogger("toolgate", config.logging.level, outputForFormat(config.logging.format));
  return {
    registry: deps.registry ?? new ToolRegistry(),
    approval: {
      tools: config.approval.tools,
      allTools: config.approval.allTools,
      handler: deps.approvalHandler,
    },
    retry: { ...config.retry },
    toolTimeoutMs: config.execution.toolTimeoutMs,
    parallel: {
      enabled: config.execution.parallel,
      maxConcurrent: config.execution.maxConcurrent,
      safetyMode: config.execution.safetyMode,
    },
    events: new EventStream({
      capacity: config.events.capacity,
      overflow: config.events.overflow,
      logger: logger.child("events"),
    }),
    hooks: deps.hooks,
    logger: logger.child("dispatcher"),
  };
}

export function createDispatcher(config: ToolgateConfig, deps: CreateDispatcherDeps = {}): ToolDispatcher {
  return new ToolDispatcher(dispatcherOptionsFromConfig(config, deps));
}
