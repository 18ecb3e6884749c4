import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { envBool, envFloat, envInt, envList, envString, hasEnv, isJsonObject } from "@toolgate/shared";
import { errorMessage } from "../errors/errors.js";
import { DEFAULT_CONFIG, mergeConfig, validateConfig } from "./schema.js";
import type { ToolgateConfig, ConfigSource } from "./types.js";

const CONFIG_DIR = ".toolgate";
const CONFIG_FILE = "config.json";

export const ENV_KEYS = {
  parallel: "TOOLGATE_PARALLEL",
  maxConcurrent: "TOOLGATE_MAX_CONCURRENT",
  safetyMode: "TOOLGATE_SAFETY_MODE",
  toolTimeoutMs: "TOOLGATE_TOOL_TIMEOUT_MS",
  maxAttempts: "TOOLGATE_RETRY_MAX_ATTEMPTS",
  initialDelayMs: "TOOLGATE_RETRY_INITIAL_DELAY_MS",
  maxDelayMs: "TOOLGATE_RETRY_MAX_DELAY_MS",
  multiplier: "TOOLGATE_RETRY_MULTIPLIER",
  approvalTools: "TOOLGATE_APPROVAL_TOOLS",
  approvalAll: "TOOLGATE_APPROVAL_ALL",
  eventCapacity: "TOOLGATE_EVENT_CAPACITY",
  eventOverflow: "TOOLGATE_EVENT_OVERFLOW",
  logLevel: "TOOLGATE_LOG_LEVEL",
  logFormat: "TOOLGATE_LOG_FORMAT",
} as const;

export type LoadOptions = {
  /** Directory holding the user-wide config.json; defaults to ~/.toolgate. */
  globalDir?: string;
};

export type LoadResult = {
  config: ToolgateConfig;
  sources: ConfigSource[];
  errors: string[];
};

export function loadConfig(projectDir?: string, opts: LoadOptions = {}): LoadResult {
  const sources: ConfigSource[] = ["default"];
  const errors: string[] = [];
  let config = structuredClone(DEFAULT_CONFIG);

  const apply = (source: ConfigSource, raw: Record<string, unknown> | null) => {
    if (!raw) return;
    const validation = validateConfig(raw);
    if (validation.valid) {
      config = mergeConfig(config, raw);
      sources.push(source);
    } else {
      errors.push(...validation.errors.map((e) => `[${source}] ${e}`));
    }
  };

  const globalDir = opts.globalDir ?? path.join(os.homedir(), CONFIG_DIR);
  apply("global", readJsonConfig(path.join(globalDir, CONFIG_FILE), errors, "global"));

  if (projectDir) {
    const projectPath = path.join(projectDir, CONFIG_DIR, CONFIG_FILE);
    apply("project", readJsonConfig(projectPath, errors, "project"));
  }

  apply("env", envOverrides());

  return { config, sources, errors };
}

export function getConfigValue(config: ToolgateConfig, key: string): unknown {
  const parts = key.split(".");
  let current: unknown = config;
  for (const part of parts) {
    if (!isJsonObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/** Returns a copy of `config` with one dot-path value replaced; throws when the result is invalid. */
export function setConfigValue(config: ToolgateConfig, key: string, value: unknown): ToolgateConfig {
  const parts = key.split(".").map((part) => part.trim()).filter(Boolean);
  const [sectionKey, field] = parts;
  if (parts.length !== 2 || !sectionKey || !field || getConfigValue(config, key) === undefined) {
    throw new Error(`Unknown config key: ${key}`);
  }
  const override = { [sectionKey]: { [field]: value } };
  const validation = validateConfig(override);
  if (!validation.valid) {
    throw new Error(`Invalid value for ${key}: ${validation.errors.join("; ")}`);
  }
  return mergeConfig(config, override);
}

function readJsonConfig(
  filePath: string,
  errors: string[],
  source: ConfigSource,
): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const content = fs.readFileSync(filePath, "utf-8").trim();
    if (!content) return null;
    const parsed: unknown = JSON.parse(content);
    if (isJsonObject(parsed)) return parsed;
    errors.push(`[${source}] config root must be an object`);
  } catch (err) {
    errors.push(`[${source}] cannot read ${filePath}: ${errorMessage(err)}`);
  }
  return null;
}

function envOverrides(): Record<string, unknown> | null {
  if (!Object.values(ENV_KEYS).some((key) => hasEnv(key))) return null;

  const execution: Record<string, unknown> = {};
  const retry: Record<string, unknown> = {};
  const approval: Record<string, unknown> = {};
  const events: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};

  if (hasEnv(ENV_KEYS.parallel)) execution.parallel = envBool(ENV_KEYS.parallel);
  if (hasEnv(ENV_KEYS.maxConcurrent)) execution.maxConcurrent = envInt(ENV_KEYS.maxConcurrent, NaN);
  if (hasEnv(ENV_KEYS.safetyMode)) execution.safetyMode = envString(ENV_KEYS.safetyMode);
  if (hasEnv(ENV_KEYS.toolTimeoutMs)) execution.toolTimeoutMs = envInt(ENV_KEYS.toolTimeoutMs, NaN);

  if (hasEnv(ENV_KEYS.maxAttempts)) retry.maxAttempts = envInt(ENV_KEYS.maxAttempts, NaN);
  if (hasEnv(ENV_KEYS.initialDelayMs)) retry.initialDelayMs = envInt(ENV_KEYS.initialDelayMs, NaN);
  if (hasEnv(ENV_KEYS.maxDelayMs)) retry.maxDelayMs = envInt(ENV_KEYS.maxDelayMs, NaN);
  if (hasEnv(ENV_KEYS.multiplier)) retry.multiplier = envFloat(ENV_KEYS.multiplier, NaN);

  if (hasEnv(ENV_KEYS.approvalTools)) approval.tools = envList(ENV_KEYS.approvalTools);
  if (hasEnv(ENV_KEYS.approvalAll)) approval.allTools = envBool(ENV_KEYS.approvalAll);

  if (hasEnv(ENV_KEYS.eventCapacity)) events.capacity = envInt(ENV_KEYS.eventCapacity, NaN);
  if (hasEnv(ENV_KEYS.eventOverflow)) events.overflow = envString(ENV_KEYS.eventOverflow);

  if (hasEnv(ENV_KEYS.logLevel)) logging.level = envString(ENV_KEYS.logLevel).toLowerCase();
  if (hasEnv(ENV_KEYS.logFormat)) logging.format = envString(ENV_KEYS.logFormat).toLowerCase();

  return { execution, retry, approval, events, logging };
}
