import { describe, expect, it } from "vitest";
import { booleanArg, requireStringArg, stringArg } from "./args.js";

describe("args", () => {
  it("stringArg keeps strings and drops other values", () => {
    expect(stringArg("log.html")).toBe("log.html");
    expect(stringArg("")).toBe("");
    expect(stringArg(undefined)).toBeUndefined();
    expect(stringArg(true)).toBeUndefined();
  });

  it("requireStringArg rejects missing and blank values", () => {
    expect(requireStringArg("out.json", "output")).toBe("out.json");
    expect(() => requireStringArg(undefined, "output")).toThrow(
      "Missing required option --output"
    );
    expect(() => requireStringArg("  ", "input")).toThrow(
      "Missing required option --input"
    );
  });

  it("booleanArg is true only for true", () => {
    expect(booleanArg(true)).toBe(true);
    expect(booleanArg("true")).toBe(false);
    expect(booleanArg(undefined)).toBe(false);
  });
});
