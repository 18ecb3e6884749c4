import { describe, it, expect } from "vitest";
import { encodeArguments } from "./arguments.js";
import { ArgumentEncodingError } from "../errors/errors.js";

describe("encodeArguments", () => {
  it("copies plain JSON arguments", () => {
    const input = { path: "/tmp/a", lines: [1, 2], opts: { force: true, note: null } };
    const encoded = encodeArguments(input);
    expect(encoded).toEqual(input);
    expect(encoded).not.toBe(input);
    expect(encoded.opts).not.toBe(input.opts);
  });

  it("follows JSON rules for undefined and toJSON", () => {
    const when = new Date("2024-05-01T10:00:00.000Z");
    const encoded = encodeArguments({ skip: undefined, list: [undefined, "x"], when });
    expect(encoded).toEqual({ list: [null, "x"], when: "2024-05-01T10:00:00.000Z" });
  });

  it("rejects bigint with its path", () => {
    expect(() => encodeArguments({ nested: { big: 1n } })).toThrow(
      new ArgumentEncodingError("arguments.nested.big has unsupported type bigint"),
    );
  });

  it("rejects non-finite numbers", () => {
    expect(() => encodeArguments({ ratio: Number.NaN })).toThrow("arguments.ratio is not a finite number");
  });

  it("rejects functions inside arrays", () => {
    expect(() => encodeArguments({ list: [1, () => 2] })).toThrow(
      "arguments.list[1] has unsupported type function",
    );
  });

  it("rejects circular references", () => {
    const loop: Record<string, unknown> = { name: "loop" };
    loop.self = loop;
    expect(() => encodeArguments({ loop })).toThrow("arguments.loop.self contains a circular reference");
  });

  it("allows the same object twice when it is not a cycle", () => {
    const shared = { id: 1 };
    expect(encodeArguments({ a: shared, b: shared })).toEqual({ a: { id: 1 }, b: { id: 1 } });
  });
});
