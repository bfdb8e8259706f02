/**
 * Tests for the Extractor and the default trigger pipeline.
 */

import { describe, expect, it, vi } from "vitest";
import { passthroughParser } from "../context/index.js";
import type { ContextParser } from "../context/types.js";
import { createExtractor, Extractor, maxLineLength } from "../extractor.js";
import {
  createDefaultRegistry,
  extractTriggers,
  extractTriggersFromText,
} from "../index.js";
import { serializeResult } from "../serialize.js";

// ============================================================================
// Test Fixtures
// ============================================================================

const detailedBlock = `Parameterized Remote Trigger Configuration:
  - job: AQA_Test_Pipeline
  - remoteJenkinsName: temurin-compliance
  - parameters: [PLATFORMS=x86-64_linux]
  - blockBuildUntilComplete: true
  - connectionRetryLimit: 5
  - trustAllCertificates: false
Triggering parameterized remote job 'https://ci.example.org/job/AQA_Test_Pipeline'
  Using 'Credentials Authentication' as user 'test-user' (Credentials ID 'test-cred')
  CSRF protection is enabled on the remote server.`;

const simpleLine =
  "Triggering remote job 'https://ci.example.org/job/Downstream_Job'";

const announcementLine =
  "[2025-07-15 10:23:45] Eclipse Temurin AQA test trigger: Grinder PLATFORMS=aarch64_linux";

const consoleHtml = `<html><head><title>Console</title></head><body><pre class="console-output">Started by user anonymous
Parameterized Remote Trigger Configuration:
  - job: AQA_Test_Pipeline
  - parameters: [TARGETS=sanity.openjdk, CUSTOMIZED_SDK_URL=https://ci.example.org/job/build/1/artifact/jdk%2B21.tar.gz]
  - blockBuildUntilComplete: TRUE
Triggering parameterized remote job '<a href="https://ci.example.org/job/AQA_Test_Pipeline">https://ci.example.org/job/AQA_Test_Pipeline</a>'
Finished: SUCCESS
</pre></body></html>`;

// ============================================================================
// Extraction Properties
// ============================================================================

describe("extractTriggersFromText", () => {
  it("extracts exactly one typed record from a single detailed block", () => {
    const result = extractTriggersFromText(detailedBlock);

    expect(result.total_triggers).toBe(1);
    expect(result.remote_triggers).toEqual([
      {
        trigger_type: "detailed",
        job_name: "AQA_Test_Pipeline",
        remote_jenkins_name: "temurin-compliance",
        parameters: { PLATFORMS: "x86-64_linux" },
        block_build_until_complete: true,
        connection_retry_limit: 5,
        trust_all_certificates: false,
        remote_job_url: "https://ci.example.org/job/AQA_Test_Pipeline",
        authentication_user: "test-user",
        csrf_protection_enabled: true,
      },
    ]);
  });

  it("returns an empty result for text without markers", () => {
    const result = extractTriggersFromText(
      "Started by user anonymous\nBuilding in workspace /tmp/ws\nFinished: SUCCESS\n"
    );
    expect(serializeResult(result)).toBe(
      '{\n  "remote_triggers": [],\n  "total_triggers": 0\n}\n'
    );
  });

  it("keeps total_triggers equal to the record count", () => {
    const inputs = [
      "",
      simpleLine,
      `${simpleLine}\n${simpleLine}`,
      `${detailedBlock}\n${simpleLine}\n${announcementLine}`,
    ];
    for (const input of inputs) {
      const result = extractTriggersFromText(input);
      expect(result.total_triggers).toBe(result.remote_triggers.length);
    }
  });

  it("orders records by first occurrence", () => {
    const result = extractTriggersFromText(
      [announcementLine, "", detailedBlock, "Finished", simpleLine].join("\n")
    );
    expect(result.remote_triggers.map((t) => t.trigger_type)).toEqual([
      "eclipse_temurin_announcement",
      "detailed",
      "simple",
    ]);
  });

  it("captures a simple trigger directly after a detailed block", () => {
    const result = extractTriggersFromText(`${detailedBlock}\n${simpleLine}`);

    expect(result.total_triggers).toBe(2);
    expect(result.remote_triggers[0]).toMatchObject({
      trigger_type: "detailed",
      job_name: "AQA_Test_Pipeline",
      connection_retry_limit: 5,
    });
    expect(result.remote_triggers[1]).toEqual({
      trigger_type: "simple",
      job_name: "Downstream_Job",
      target: "https://ci.example.org/job/Downstream_Job",
      line: 11,
    });
  });

  it("keeps a trigger-like line inside an open block as a parameter", () => {
    const result = extractTriggersFromText(`Parameterized Remote Trigger Configuration:
  - job: AQA_Test_Pipeline
  CAUSE=Triggering remote job Other_Job
  - cause: Triggering remote job Another_Job
Triggering parameterized remote job 'https://ci.example.org/job/AQA_Test_Pipeline'`);

    expect(result.total_triggers).toBe(1);
    expect(result.remote_triggers[0]).toMatchObject({
      trigger_type: "detailed",
      parameters: {
        CAUSE: "Triggering remote job Other_Job",
        cause: "Triggering remote job Another_Job",
      },
    });
  });

  it("keeps a bare remote job directive inside an open block", () => {
    const result = extractTriggersFromText(`Parameterized Remote Trigger Configuration:
  - job: AQA_Test_Pipeline
  Triggering remote job Other_Job
  - connectionRetryLimit: 5
Triggering parameterized remote job 'https://ci.example.org/job/AQA_Test_Pipeline'`);

    expect(result).toEqual({
      remote_triggers: [
        {
          trigger_type: "detailed",
          job_name: "AQA_Test_Pipeline",
          parameters: {},
          connection_retry_limit: 5,
          remote_job_url: "https://ci.example.org/job/AQA_Test_Pipeline",
        },
      ],
      total_triggers: 1,
    });
  });

  it("yields one record for a line several patterns could match", () => {
    const result = extractTriggersFromText(
      "[10:00:00] Parameterized Remote Trigger Configuration: - job: Both_Job"
    );
    expect(result.remote_triggers).toEqual([
      { trigger_type: "detailed", job_name: "Both_Job", parameters: {} },
    ]);
  });
});

describe("extractTriggers", () => {
  it("extracts triggers from an HTML console page", () => {
    expect(extractTriggers(consoleHtml).remote_triggers).toEqual([
      {
        trigger_type: "detailed",
        job_name: "AQA_Test_Pipeline",
        parameters: {
          TARGETS: "sanity.openjdk",
          CUSTOMIZED_SDK_URL:
            "https://ci.example.org/job/build/1/artifact/jdk+21.tar.gz",
        },
        block_build_until_complete: true,
        remote_job_url: "https://ci.example.org/job/AQA_Test_Pipeline",
      },
    ]);
  });

  it("succeeds with zero triggers on plain text", () => {
    expect(extractTriggers("just some text\nwith no markers")).toEqual({
      remote_triggers: [],
      total_triggers: 0,
    });
  });
});

// ============================================================================
// Extractor Behavior
// ============================================================================

describe("Extractor", () => {
  it("skips and reports lines longer than maxLineLength", () => {
    const onAnomaly = vi.fn();
    const extractor = createExtractor(createDefaultRegistry());
    const longLine = `Triggering remote job ${"x".repeat(maxLineLength)}`;

    const records = extractor.extract(longLine, passthroughParser, { onAnomaly });

    expect(records).toEqual([]);
    expect(onAnomaly).toHaveBeenCalledWith({
      line: 1,
      parser: "context",
      message: `line longer than ${maxLineLength} characters skipped`,
    });
  });

  it("skips lines the context parser throws on", () => {
    const throwing: ContextParser = {
      parseLine(line: string) {
        if (line.startsWith("bad")) {
          throw new Error("unreadable line");
        }
        return {
          ctx: { timestamp: "" },
          cleanLine: line,
          skip: false,
        };
      },
    };
    const onAnomaly = vi.fn();
    const extractor = new Extractor(createDefaultRegistry());

    const records = extractor.extract(`bad line\n${simpleLine}`, throwing, {
      onAnomaly,
    });

    expect(records).toHaveLength(1);
    expect(onAnomaly).toHaveBeenCalledWith({
      line: 1,
      parser: "context",
      message: "unreadable line",
    });
  });

  it("does not carry an open block into the next extraction", () => {
    const extractor = createExtractor(createDefaultRegistry());
    extractor.extract(
      "Parameterized Remote Trigger Configuration:\n  - job: First",
      passthroughParser
    );
    const records = extractor.extract("  - job: Second", passthroughParser);
    expect(records).toEqual([]);
  });

  it("works without an anomaly reporter", () => {
    const extractor = createExtractor(createDefaultRegistry());
    expect(
      extractor.extract(
        "Parameterized Remote Trigger Configuration:\nFinished",
        passthroughParser
      )
    ).toEqual([]);
  });
});
