import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, JenkinsAuthError } from "../lib/errors.js";
import { createLogger, formatTimestamp } from "../utils/logger.js";
import { runGetConsole } from "./get-console.js";

const fixedDate = new Date("2025-07-15T10:23:45.123Z");
const stamp = formatTimestamp(fixedDate);

describe("runGetConsole", () => {
  let dir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  const logger = createLogger({ now: () => fixedDate });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "temurin-ci-console-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  const baseOptions = () => ({
    pipelineName: "build-scripts/openjdk21-pipeline",
    runNumber: "42",
    output: join(dir, "logs", "console.txt"),
    logger,
    env: {
      JENKINS_URL: "https://ci.example.org/",
      JENKINS_TOKEN: "test-secret",
    },
  });

  it("downloads the console log to the output file", async () => {
    const fetchMock = vi.fn(async () => new Response("Finished: SUCCESS\n"));
    vi.stubGlobal("fetch", fetchMock);

    const result = await runGetConsole(baseOptions());

    expect(result).toEqual({
      url: "https://ci.example.org/job/build-scripts/job/openjdk21-pipeline/42/consoleText",
      bytes: 18,
    });
    await expect(
      readFile(join(dir, "logs", "console.txt"), "utf-8")
    ).resolves.toBe("Finished: SUCCESS\n");
    expect(logSpy).toHaveBeenCalledWith(`${stamp} File size: 18 bytes`);
  });

  it("lets flags override the environment", async () => {
    const fetchMock = vi.fn(async () => new Response(""));
    vi.stubGlobal("fetch", fetchMock);

    const result = await runGetConsole({
      ...baseOptions(),
      url: "https://jenkins.example.org",
      token: "flag-secret",
      format: "html",
    });

    expect(result.url).toBe(
      "https://jenkins.example.org/job/build-scripts/job/openjdk21-pipeline/42/consoleFull"
    );
  });

  it("rejects an invalid run number before any request", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      runGetConsole({ ...baseOptions(), runNumber: "0" })
    ).rejects.toThrow(new ConfigError("Run number must be a positive integer"));
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects an unknown format", async () => {
    await expect(
      runGetConsole({ ...baseOptions(), format: "json" })
    ).rejects.toThrow(
      "Unknown console format 'json' (expected one of text, html, timestamps)"
    );
  });

  it("requires a token", async () => {
    await expect(
      runGetConsole({ ...baseOptions(), env: {} })
    ).rejects.toThrow(
      "Either --token or --token-file must be provided (or set JENKINS_TOKEN)"
    );
  });

  it("propagates authentication failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 401 }))
    );
    await expect(runGetConsole(baseOptions())).rejects.toThrow(
      JenkinsAuthError
    );
  });
});
