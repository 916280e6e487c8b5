import { describe, it, expect } from "vitest";
import { parseArgs } from "../../src/utils/args.js";
import { BOOLEAN_FLAGS } from "../../src/main.js";

describe("parseArgs", () => {
  it("should parse boolean flags", () => {
    const result = parseArgs(["--update", "--follow"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { update: true, follow: true },
      positional: [],
    });
  });

  it("should parse --flag=value", () => {
    const result = parseArgs(["--payload=file:///data/ota/payload.bin"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { payload: "file:///data/ota/payload.bin" },
      positional: [],
    });
  });

  it("should parse --flag value for string flags", () => {
    const result = parseArgs(["--update", "--payload", "http://10.0.0.2/p.bin"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { update: true, payload: "http://10.0.0.2/p.bin" },
      positional: [],
    });
  });

  it("should take a value starting with '-' for a string flag", () => {
    const result = parseArgs(["--update", "--headers", "-x: 1"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { update: true, headers: "-x: 1" },
      positional: [],
    });
  });

  it("should not let boolean flags consume the next argument", () => {
    const result = parseArgs(["--suspend", "now"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { suspend: true },
      positional: ["now"],
    });
  });

  it("should parse explicit boolean values", () => {
    const result = parseArgs(["--follow=false", "--update=true"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { follow: false, update: true },
      positional: [],
    });
  });

  it("should keep a non-boolean value of a boolean flag as a string", () => {
    const result = parseArgs(["--follow=yes"], BOOLEAN_FLAGS);
    expect(result.flags).toEqual({ follow: "yes" });
  });

  it("should keep newlines and '=' inside values", () => {
    const result = parseArgs(["--headers=A: 1\nB: x=y\n"], BOOLEAN_FLAGS);
    expect(result.flags).toEqual({ headers: "A: 1\nB: x=y\n" });
  });

  it("should accept an empty value", () => {
    const result = parseArgs(["--payload="], BOOLEAN_FLAGS);
    expect(result.flags).toEqual({ payload: "" });
  });

  it("should parse short flags", () => {
    const result = parseArgs(["-h"], BOOLEAN_FLAGS);
    expect(result).toEqual({ flags: { h: true }, positional: [] });
  });

  it("should treat everything after -- as positional", () => {
    const result = parseArgs(["--cancel", "--", "--resume", "x"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { cancel: true },
      positional: ["--resume", "x"],
    });
  });

  it("should collect positional arguments", () => {
    const result = parseArgs(["first", "--resume", "second"], BOOLEAN_FLAGS);
    expect(result).toEqual({
      flags: { resume: true },
      positional: ["first", "second"],
    });
  });

  it("should parse no arguments", () => {
    expect(parseArgs([])).toEqual({ flags: {}, positional: [] });
  });
});
