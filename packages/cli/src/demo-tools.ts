import { sleep } from "@toolgate/shared";
import { ToolRegistry, defineTool } from "@toolgate/core";
import type { Tool } from "@toolgate/core";

const DEFAULT_SLEEP_MS = 100;

/** Tools the `run` command can call without any external setup. */
export function createDemoTools(): Tool[] {
  let total = 0;

  return [
    defineTool({
      name: "echo",
      description: "Returns `text` verbatim, or the whole argument object",
      handler: (args) => (typeof args.text === "string" ? args.text : args),
    }),
    defineTool({
      name: "sleep",
      description: "Waits `ms` milliseconds, honouring cancellation",
      handler: async (args, ctx) => {
        const ms = typeof args.ms === "number" ? args.ms : DEFAULT_SLEEP_MS;
        await sleep(ms, ctx.signal);
        return `slept ${ms}ms`;
      },
    }),
    defineTool({
      name: "fail",
      description: "Always throws `message`",
      handler: (args) => {
        throw new Error(typeof args.message === "string" ? args.message : "requested failure");
      },
    }),
    defineTool({
      name: "flaky",
      description: "Fails the first `failures` attempts, then succeeds",
      handler: (args, ctx) => {
        const failures = typeof args.failures === "number" ? args.failures : 1;
        if (ctx.attempt <= failures) {
          throw new Error(`attempt ${ctx.attempt} failed`);
        }
        return `succeeded on attempt ${ctx.attempt}`;
      },
    }),
    defineTool({
      name: "tally",
      description: "Adds `by` to a shared counter, one call at a time",
      concurrency: "serial",
      handler: (args) => {
        total += typeof args.by === "number" ? args.by : 1;
        return { total };
      },
    }),
  ];
}

export function createDemoRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of createDemoTools()) registry.register(tool);
  return registry;
}
