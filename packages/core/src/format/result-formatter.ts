/**
 * Renders a handler result as message content:
 * null/undefined -> "null", strings verbatim, errors as "Error: <message>",
 * anything else as JSON, or String(value) when JSON cannot represent it.
 */
export function formatToolResult(result: unknown): string {
  if (result === null || result === undefined) return "null";
  if (typeof result === "string") return result;
  if (result instanceof Error) return `Error: ${result.message}`;

  try {
    const json = JSON.stringify(result);
    if (typeof json === "string") return json;
  } catch {
    // cyclic structures and bigint fall through to the textual form
  }
  return fallbackText(result);
}

function fallbackText(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
