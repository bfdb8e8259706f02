import { describe, expect, it } from "vitest";
import {
  extractParentInfo,
  extractSpawnedJobs,
  parseSpawnedJobs,
} from "../spawned.js";

const pipelineConsole = `Started by upstream project "build-scripts/openjdk21-pipeline" build number 314
Running on test-agent-1 in /home/jenkins/workspace/x
Starting building: AQA_Test_Pipeline #12
Triggering downstream project Release_Notes
Scheduling project: Release_Notes
https://ci.example.org/job/Test_openjdk21_hs_sanity.openjdk_x86-64_linux/55/
Build AQA_Test_Pipeline #12 completed with result SUCCESS
Test_Smoke #7 completed: UNSTABLE`;

describe("parseSpawnedJobs", () => {
  it("returns empty results for empty input", () => {
    expect(parseSpawnedJobs("")).toEqual({
      parent: {
        name: "Unknown",
        build_number: "Unknown",
        url: null,
        node: null,
      },
      spawned_jobs: [],
    });
  });

  it("returns no jobs for unrelated output", () => {
    const result = parseSpawnedJobs(
      "This is a regular log line\nBuild completed successfully\n"
    );
    expect(result.spawned_jobs).toEqual([]);
  });

  it("collects parent info and merges job lines", () => {
    expect(parseSpawnedJobs(pipelineConsole)).toEqual({
      parent: {
        name: "build-scripts/openjdk21-pipeline",
        build_number: "314",
        url: null,
        node: "test-agent-1",
      },
      spawned_jobs: [
        {
          name: "AQA_Test_Pipeline",
          build_number: "12",
          url: null,
          result: "SUCCESS",
        },
        {
          name: "Test_openjdk21_hs_sanity.openjdk_x86-64_linux",
          build_number: "55",
          url: "https://ci.example.org/job/Test_openjdk21_hs_sanity.openjdk_x86-64_linux/55",
          result: null,
        },
        {
          name: "Test_Smoke",
          build_number: "7",
          url: null,
          result: "UNSTABLE",
        },
        {
          name: "Release_Notes",
          build_number: "unknown",
          url: null,
          result: null,
        },
      ],
    });
  });
});

describe("extractSpawnedJobs", () => {
  it("prefers numbered entries over unnumbered ones", () => {
    expect(
      extractSpawnedJobs([
        "Triggering downstream project Foo",
        "Starting build job Foo #3",
      ])
    ).toEqual([{ name: "Foo", build_number: "3", url: null, result: null }]);
  });

  it("attaches a URL to a known job", () => {
    expect(
      extractSpawnedJobs([
        "Build Foo #4 started",
        "See https://ci.example.org/job/folder/job/Foo/4/console",
      ])
    ).toEqual([
      {
        name: "Foo",
        build_number: "4",
        url: "https://ci.example.org/job/folder/job/Foo/4",
        result: null,
      },
    ]);
  });
});

describe("extractParentInfo", () => {
  it("takes the pipeline name from a Pipeline line", () => {
    expect(extractParentInfo(["Pipeline: openjdk21-pipeline"])).toMatchObject({
      name: "openjdk21-pipeline",
      build_number: "Unknown",
    });
  });
});
