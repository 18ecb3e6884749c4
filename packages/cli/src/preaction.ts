import { Command } from "commander";
import { LOG_LEVELS } from "@toolgate/core";
import type { LogLevel } from "@toolgate/core";

function setProcessTitle(actionCommand: Command): void {
  const segments: string[] = [];
  let current: Command | null = actionCommand;
  while (current?.parent) {
    segments.unshift(current.name());
    current = current.parent;
  }
  if (segments.length === 0) return;
  process.title = `toolgate-${segments.join("-")}`;
}

export function parseLogLevel(raw: unknown): LogLevel | undefined {
  if (raw === undefined) return undefined;
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new Error(`Invalid --log-level "${String(raw)}": expected ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

export function registerCliPreActionHooks(program: Command): void {
  program.hook("preAction", (_thisCommand, actionCommand) => {
    setProcessTitle(actionCommand);
    parseLogLevel(actionCommand.optsWithGlobals().logLevel);
  });
}
