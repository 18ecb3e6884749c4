import type { JsonObject } from "@toolgate/shared";
import type { Tool, ToolDefinitionInput } from "./types.js";

export function defineTool(input: ToolDefinitionInput): Tool {
  const name = input.name.trim();
  if (!name) {
    throw new Error("Tool name must not be empty");
  }
  return Object.freeze({
    name,
    description: input.description ?? "",
    concurrency: input.concurrency ?? "parallel",
    handler: input.handler,
  });
}

/** "assign_team" -> "Assign Team" */
export function formatToolName(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/** Human-readable line shown to whoever approves the call. */
export function describeToolCall(tool: Tool | undefined, name: string, args: JsonObject): string {
  if (tool?.description) return tool.description;
  return `${formatToolName(name)}(${Object.keys(args).join(", ")})`;
}
