import { Command } from "commander";
import type { Tool } from "@toolgate/core";
import { createDemoTools } from "../demo-tools.js";

export function formatToolTable(tools: Tool[]): string[] {
  const width = Math.max(...tools.map((t) => t.name.length), 4);
  return tools.map((t) => `${t.name.padEnd(width)}  ${t.concurrency.padEnd(8)}  ${t.description}`);
}

export function toolsCommand(): Command {
  return new Command("tools")
    .description("List the demo tools available to `run`")
    .option("--json", "Output raw JSON", false)
    .action((opts: { json?: boolean }) => {
      const tools = createDemoTools();
      if (opts.json) {
        const rows = tools.map(({ name, description, concurrency }) => ({ name, description, concurrency }));
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      for (const line of formatToolTable(tools)) console.log(line);
    });
}
