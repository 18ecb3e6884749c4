import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { configCommand } from "./commands/config.js";
import { toolsCommand } from "./commands/tools.js";
import { registerCliPreActionHooks } from "./preaction.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("toolgate")
    .description("Run batches of model tool calls with approval, retry and timeouts")
    .version("0.1.0")
    .option("--log-level <level>", "Override the configured log level");

  registerCliPreActionHooks(program);

  program.addCommand(runCommand());
  program.addCommand(toolsCommand());
  program.addCommand(configCommand());

  return program;
}
