import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { isJsonObject } from "@toolgate/shared";
import { DEFAULT_CONFIG, errorMessage, loadConfig, getConfigValue, validateConfig } from "@toolgate/core";

const CONFIG_DIR = ".toolgate";
const CONFIG_FILE = "config.json";

type ConfigScope = "global" | "project";

export type ConfigCommandOptions = {
  /** Directory whose .toolgate/config.json is the project layer. Defaults to the working directory. */
  projectDir?: string;
  /** Directory holding the global config.json. Defaults to ~/.toolgate. */
  globalDir?: string;
};

function parseCliValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) return "";
  try {
    return JSON.parse(trimmed);
  } catch {
    return raw;
  }
}

function readRawConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    const raw = fs.readFileSync(filePath, "utf-8").trim();
    if (!raw) return {};
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Cannot read config at ${filePath}: ${errorMessage(err)}`);
  }
  if (!isJsonObject(parsed)) {
    throw new Error(`Cannot read config at ${filePath}: config root must be an object`);
  }
  return parsed;
}

export function setAtDotPath(
  input: Record<string, unknown>,
  key: string,
  value: unknown,
): Record<string, unknown> {
  const parts = key.split(".").map((part) => part.trim()).filter(Boolean);
  const last = parts.pop();
  if (!last) {
    throw new Error("Invalid config key");
  }

  const out = structuredClone(input);
  let current: Record<string, unknown> = out;
  for (const part of parts) {
    const next = current[part];
    const child: Record<string, unknown> = isJsonObject(next) ? next : {};
    current[part] = child;
    current = child;
  }
  current[last] = value;
  return out;
}

function writeRawConfigFile(filePath: string, config: Record<string, unknown>) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
}

function formatValue(value: unknown, pretty: boolean): string {
  if (typeof value === "object" && value !== null) {
    return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
  }
  return String(value);
}

export function configCommand(options: ConfigCommandOptions = {}): Command {
  const projectDir = () => options.projectDir ?? process.cwd();
  const globalDir = options.globalDir ?? path.join(os.homedir(), CONFIG_DIR);
  const load = () => loadConfig(projectDir(), { globalDir });
  const scopePath = (scope: ConfigScope) =>
    scope === "project" ? path.join(projectDir(), CONFIG_DIR, CONFIG_FILE) : path.join(globalDir, CONFIG_FILE);

  const cmd = new Command("config").description("Inspect and change configuration");

  cmd
    .command("get <key>")
    .description("Get a config value by dot-path (e.g. execution.maxConcurrent)")
    .action((key: string) => {
      const { config } = load();
      const value = getConfigValue(config, key);
      if (value === undefined) {
        console.error(`Config key not found: ${key}`);
        process.exitCode = 1;
        return;
      }
      console.log(formatValue(value, true));
    });

  cmd
    .command("list")
    .description("List all config values and where they came from")
    .action(() => {
      const { config, sources, errors } = load();
      console.log(JSON.stringify(config, null, 2));
      console.log(`\nSources: ${sources.join(" → ")}`);
      for (const error of errors) console.error(`Ignored: ${error}`);
    });

  cmd
    .command("set <key> <value>")
    .description("Set and persist a config value by dot-path")
    .option("--project", "Write to ./.toolgate/config.json")
    .option("--global", "Write to ~/.toolgate/config.json (default)")
    .action((key: string, value: string, opts: { project?: boolean; global?: boolean }) => {
      if (opts.project && opts.global) {
        console.error("Choose only one scope: --project or --global");
        process.exitCode = 1;
        return;
      }

      if (getConfigValue(DEFAULT_CONFIG, key) === undefined) {
        console.error(`Unknown config key: ${key}`);
        process.exitCode = 1;
        return;
      }

      const targetPath = scopePath(opts.project ? "project" : "global");
      const updatedRaw = setAtDotPath(readRawConfigFile(targetPath), key, parseCliValue(value));
      const validation = validateConfig(updatedRaw);
      if (!validation.valid) {
        console.error(`Config validation failed: ${validation.errors.join("; ")}`);
        process.exitCode = 1;
        return;
      }

      writeRawConfigFile(targetPath, updatedRaw);

      const result = getConfigValue(load().config, key);
      console.log(`${key} = ${formatValue(result, false)}`);
      console.log(`Saved to ${targetPath}`);
    });

  return cmd;
}
