import { describe, expect, it } from "vitest";
import { formatBytes, formatCount } from "./format.js";

describe("formatCount", () => {
  it("uses the singular for one", () => {
    expect(formatCount(1, "trigger")).toBe("1 trigger");
  });

  it("uses the plural otherwise", () => {
    expect(formatCount(0, "job")).toBe("0 jobs");
    expect(formatCount(3, "trigger")).toBe("3 triggers");
  });
});

describe("formatBytes", () => {
  it("formats small sizes in bytes", () => {
    expect(formatBytes(512)).toBe("512 bytes");
  });

  it("adds a binary unit for larger sizes", () => {
    expect(formatBytes(2048)).toBe("2048 bytes (2.0 KiB)");
    expect(formatBytes(3_145_728)).toBe("3145728 bytes (3.0 MiB)");
  });
});
