import { isJsonObject, MAX_TIMER_DELAY_MS } from "@toolgate/shared";
import type { ToolgateConfig } from "./types.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export const LOG_FORMATS = ["json", "pretty"] as const;
export const SAFETY_MODES = ["optimistic", "pessimistic"] as const;
export const OVERFLOW_POLICIES = ["drop-oldest", "drop-newest"] as const;

export const DEFAULT_CONFIG: ToolgateConfig = {
  execution: {
    parallel: false,
    maxConcurrent: 4,
    safetyMode: "optimistic",
    toolTimeoutMs: 10_000,
  },
  retry: {
    maxAttempts: 3,
    initialDelayMs: 200,
    maxDelayMs: 5_000,
    multiplier: 2,
  },
  approval: {
    tools: [],
    allTools: false,
  },
  events: {
    capacity: 1024,
    overflow: "drop-oldest",
  },
  logging: {
    level: "info",
    format: "pretty",
  },
};

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  return isJsonObject(value) ? value : undefined;
}

function oneOf(value: unknown, allowed: readonly string[]): boolean {
  return typeof value === "string" && allowed.includes(value);
}

function isInt(value: unknown, min: number, max = Number.MAX_SAFE_INTEGER): boolean {
  return typeof value === "number" && Number.isInteger(value) && value >= min && value <= max;
}

export function validateConfig(raw: Record<string, unknown>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const e = section(raw, "execution");
  if (e) {
    if (e.parallel !== undefined && typeof e.parallel !== "boolean") {
      errors.push("execution.parallel must be a boolean");
    }
    if (e.maxConcurrent !== undefined && !isInt(e.maxConcurrent, 1)) {
      errors.push("execution.maxConcurrent must be an integer >= 1");
    }
    if (e.safetyMode !== undefined && !oneOf(e.safetyMode, SAFETY_MODES)) {
      errors.push("execution.safetyMode must be optimistic or pessimistic");
    }
    if (e.toolTimeoutMs !== undefined && !isInt(e.toolTimeoutMs, 0, MAX_TIMER_DELAY_MS)) {
      errors.push(`execution.toolTimeoutMs must be an integer between 0 and ${MAX_TIMER_DELAY_MS}`);
    }
  }

  const r = section(raw, "retry");
  if (r) {
    if (r.maxAttempts !== undefined && !isInt(r.maxAttempts, 1)) {
      errors.push("retry.maxAttempts must be an integer >= 1");
    }
    if (r.initialDelayMs !== undefined && !isInt(r.initialDelayMs, 0, MAX_TIMER_DELAY_MS)) {
      errors.push(`retry.initialDelayMs must be an integer between 0 and ${MAX_TIMER_DELAY_MS}`);
    }
    if (r.maxDelayMs !== undefined && !isInt(r.maxDelayMs, 0, MAX_TIMER_DELAY_MS)) {
      errors.push(`retry.maxDelayMs must be an integer between 0 and ${MAX_TIMER_DELAY_MS}`);
    }
    if (r.multiplier !== undefined && (typeof r.multiplier !== "number" || r.multiplier < 1)) {
      errors.push("retry.multiplier must be a number >= 1");
    }
  }

  const a = section(raw, "approval");
  if (a) {
    if (a.tools !== undefined && (!Array.isArray(a.tools) || !a.tools.every((t) => typeof t === "string"))) {
      errors.push("approval.tools must be an array of tool names");
    }
    if (a.allTools !== undefined && typeof a.allTools !== "boolean") {
      errors.push("approval.allTools must be a boolean");
    }
  }

  const ev = section(raw, "events");
  if (ev) {
    if (ev.capacity !== undefined && !isInt(ev.capacity, 1)) {
      errors.push("events.capacity must be an integer >= 1");
    }
    if (ev.overflow !== undefined && !oneOf(ev.overflow, OVERFLOW_POLICIES)) {
      errors.push("events.overflow must be drop-oldest or drop-newest");
    }
  }

  const l = section(raw, "logging");
  if (l) {
    if (l.level !== undefined && !oneOf(l.level, LOG_LEVELS)) {
      errors.push("logging.level must be debug, info, warn, error, or silent");
    }
    if (l.format !== undefined && !oneOf(l.format, LOG_FORMATS)) {
      errors.push("logging.format must be json or pretty");
    }
  }

  return { valid: errors.length === 0, errors };
}

/** Merges an already validated override into a copy of `base`. */
export function mergeConfig(base: ToolgateConfig, override: Record<string, unknown>): ToolgateConfig {
  const result = structuredClone(base);

  const execution = section(override, "execution");
  if (execution) Object.assign(result.execution, execution);

  const retry = section(override, "retry");
  if (retry) Object.assign(result.retry, retry);

  const approval = section(override, "approval");
  if (approval) {
    if (Array.isArray(approval.tools)) {
      result.approval.tools = approval.tools.filter((t): t is string => typeof t === "string");
    }
    if (typeof approval.allTools === "boolean") result.approval.allTools = approval.allTools;
  }

  const events = section(override, "events");
  if (events) Object.assign(result.events, events);

  const logging = section(override, "logging");
  if (logging) Object.assign(result.logging, logging);

  return result;
}
