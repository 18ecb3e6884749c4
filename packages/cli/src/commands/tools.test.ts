import { describe, it, expect } from "vitest";
import { defineTool } from "@toolgate/core";
import { formatToolTable } from "./tools.js";

describe("formatToolTable", () => {
  it("aligns names and concurrency modes", () => {
    const lines = formatToolTable([
      defineTool({ name: "echo", description: "Echoes", handler: () => null }),
      defineTool({ name: "migrate", description: "Runs alone", concurrency: "serial", handler: () => null }),
    ]);
    expect(lines).toEqual(["echo     parallel  Echoes", "migrate  serial    Runs alone"]);
  });
});
