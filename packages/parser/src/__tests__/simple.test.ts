import { describe, expect, it } from "vitest";
import type { ParseContext } from "../parser-types.js";
import { createSimpleParser } from "../parsers/simple.js";

const ctxAt = (lineNumber: number): ParseContext => ({
  timestamp: "",
  lineNumber,
});

describe("SimpleTriggerParser", () => {
  const parser = createSimpleParser();

  it("derives the job name from a quoted URL target", () => {
    expect(
      parser.parse(
        "Triggering remote job 'https://ci.example.org/job/folder/job/Test_Job/'",
        ctxAt(7)
      )
    ).toEqual({
      trigger_type: "simple",
      job_name: "Test_Job",
      target: "https://ci.example.org/job/folder/job/Test_Job/",
      line: 7,
    });
  });

  it("uses a double-quoted name as written", () => {
    expect(
      parser.parse('Triggering remote job "Plain_Job"', ctxAt(1))
    ).toMatchObject({ job_name: "Plain_Job", target: "Plain_Job" });
  });

  it("trims sentence punctuation from a bare target", () => {
    expect(
      parser.parse("Triggering remote job Bare_Job.", ctxAt(1))
    ).toMatchObject({ job_name: "Bare_Job", target: "Bare_Job" });
  });

  it("matches the directive mid-line", () => {
    expect(
      parser.canParse("INFO: Triggering remote job Mid_Job", ctxAt(1))
    ).toBeGreaterThan(0);
  });

  it("ignores the plugin's progress line", () => {
    expect(parser.canParse("Triggering remote job now.", ctxAt(1))).toBe(0);
    expect(parser.canParse("Triggering remote job now", ctxAt(1))).toBe(0);
    expect(parser.parse("Triggering remote job now.", ctxAt(1))).toBeNull();
  });

  it("accepts a target that only starts with now", () => {
    expect(
      parser.parse("Triggering remote job nowhere_job", ctxAt(1))
    ).toMatchObject({ job_name: "nowhere_job" });
  });

  it("does not match parameterized directives", () => {
    expect(
      parser.canParse(
        "Triggering parameterized remote job 'https://ci.example.org/job/X'",
        ctxAt(1)
      )
    ).toBe(0);
  });

  it("is single-line", () => {
    expect(parser.supportsMultiLine()).toBe(false);
  });
});
