import { describe, it, expect } from "vitest";
import { buildProgram } from "./program.js";

describe("buildProgram", () => {
  it("creates a program named toolgate", () => {
    const program = buildProgram();
    expect(program.name()).toBe("toolgate");
  });

  it("has version 0.1.0", () => {
    const program = buildProgram();
    expect(program.version()).toBe("0.1.0");
  });

  it("registers the run, tools and config commands", () => {
    const program = buildProgram();
    expect(program.commands.map((c) => c.name())).toEqual(["run", "tools", "config"]);
  });

  it("config command has get/list/set subcommands", () => {
    const program = buildProgram();
    const config = program.commands.find((c) => c.name() === "config");
    expect(config?.commands.map((c) => c.name())).toEqual(["get", "list", "set"]);
  });

  it("run command takes the batch file as an argument", () => {
    const program = buildProgram();
    const run = program.commands.find((c) => c.name() === "run");
    expect(run?.registeredArguments.map((a) => a.name())).toEqual(["batch"]);
  });
});
