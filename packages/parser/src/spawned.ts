/**
 * Spawned-job extraction from plain-text Jenkins console output.
 *
 * A pipeline run announces the downstream builds it starts, links to them
 * and reports their results on separate lines. Lines are matched
 * independently and merged per job name and build number.
 */

// ============================================================================
// Types
// ============================================================================

export const UNKNOWN_PARENT = "Unknown";
export const UNKNOWN_BUILD = "unknown";

/**
 * ParentInfo describes the pipeline run whose console was parsed.
 */
export interface ParentInfo {
  name: string;
  build_number: string;
  url: string | null;
  node: string | null;
}

/**
 * SpawnedJob is one downstream build started by the parent.
 * build_number is UNKNOWN_BUILD when the trigger line did not print one.
 */
export interface SpawnedJob {
  name: string;
  build_number: string;
  url: string | null;
  result: string | null;
}

export interface SpawnedJobsResult {
  readonly parent: ParentInfo;
  readonly spawned_jobs: readonly SpawnedJob[];
}

// ============================================================================
// Patterns
// ============================================================================

/**
 * Downstream trigger lines.
 * Groups: 1=job name, 2=build number (optional)
 */
const jobTriggerPatterns: readonly RegExp[] = [
  /Starting building:\s+(\S+)\s+#(\d+)/i,
  /Starting build job\s+(\S+)\s+#(\d+)/i,
  /Triggering downstream project\s+(\S+)/i,
  /Scheduling project:\s+(\S+)/i,
  /Build\s+(\S+)\s+#(\d+)\s+started/i,
];

/**
 * Downstream build URLs: https://host/[job/folder/]job/NAME/N
 * Groups: 1=URL without trailing slash
 */
const jobUrlPattern = /(https?:\/\/\S+\/job\/[^/\s]+\/\d+)\/?/;

/** Groups: 1=job name, 2=build number */
const urlJobPattern = /\/job\/([^/]+)\/(\d+)/;

/**
 * Downstream result lines.
 * Groups: 1=job name, 2=build number, 3=result
 */
const jobResultPatterns: readonly RegExp[] = [
  /Build\s+(\S+)\s+#(\d+)\s+completed with result\s+(\w+)/i,
  /(\S+)\s+#(\d+)\s+completed:\s+(\w+)/i,
];

/** Groups: 1=project, 2=build number */
const upstreamPattern = /Started by upstream project "([^"]+)" build number (\d+)/i;

/** Groups: 1=node, without the " in /workspace" suffix */
const runningOnPattern = /Running on\s+(.+?)(?:\s+in\s+\S+)?\s*$/i;

/** Groups: 1=pipeline name */
const pipelineNamePattern = /^\s*Pipeline:\s+(.+?)\s*$/i;

// ============================================================================
// Line Matchers
// ============================================================================

interface JobRef {
  readonly name: string;
  readonly buildNumber: string;
}

const matchTrigger = (line: string): JobRef | undefined => {
  for (const pattern of jobTriggerPatterns) {
    const match = pattern.exec(line);
    if (match?.[1]) {
      return { name: match[1], buildNumber: match[2] ?? UNKNOWN_BUILD };
    }
  }
  return undefined;
};

const matchUrl = (line: string): (JobRef & { url: string }) | undefined => {
  const url = jobUrlPattern.exec(line)?.[1];
  if (!url) {
    return undefined;
  }
  const job = urlJobPattern.exec(url);
  if (!(job?.[1] && job[2])) {
    return undefined;
  }
  return { name: job[1], buildNumber: job[2], url };
};

const matchResult = (
  line: string
): (JobRef & { result: string }) | undefined => {
  for (const pattern of jobResultPatterns) {
    const match = pattern.exec(line);
    if (match?.[1] && match[2] && match[3]) {
      return { name: match[1], buildNumber: match[2], result: match[3] };
    }
  }
  return undefined;
};

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract information about the parent pipeline run.
 * Later lines override earlier ones.
 */
export const extractParentInfo = (lines: readonly string[]): ParentInfo => {
  const parent: ParentInfo = {
    name: UNKNOWN_PARENT,
    build_number: UNKNOWN_PARENT,
    url: null,
    node: null,
  };

  for (const line of lines) {
    const upstream = upstreamPattern.exec(line);
    if (upstream?.[1] && upstream[2]) {
      parent.name = upstream[1];
      parent.build_number = upstream[2];
    }
    const node = runningOnPattern.exec(line);
    if (node?.[1]) {
      parent.node = node[1];
    }
    const pipeline = pipelineNamePattern.exec(line);
    if (pipeline?.[1]) {
      parent.name = pipeline[1];
    }
  }

  return parent;
};

const jobKey = (name: string, buildNumber: string): string =>
  `${name}#${buildNumber}`;

/**
 * Extract spawned jobs in first-seen order.
 * Jobs with a build number come first; a job without one is kept only when
 * no numbered entry has the same name.
 */
export const extractSpawnedJobs = (lines: readonly string[]): SpawnedJob[] => {
  const jobs = new Map<string, SpawnedJob>();

  const upsert = (ref: JobRef): SpawnedJob => {
    const key = jobKey(ref.name, ref.buildNumber);
    let job = jobs.get(key);
    if (!job) {
      job = { name: ref.name, build_number: ref.buildNumber, url: null, result: null };
      jobs.set(key, job);
    }
    return job;
  };

  for (const line of lines) {
    const trigger = matchTrigger(line);
    if (trigger) {
      upsert(trigger);
    }

    const link = matchUrl(line);
    if (link) {
      upsert(link).url = link.url;
    }

    const outcome = matchResult(line);
    if (outcome) {
      upsert(outcome).result = outcome.result;
    }
  }

  const numbered = [...jobs.values()].filter(
    (job) => job.build_number !== UNKNOWN_BUILD
  );
  const numberedNames = new Set(numbered.map((job) => job.name));
  const unnumbered = [...jobs.values()].filter(
    (job) => job.build_number === UNKNOWN_BUILD && !numberedNames.has(job.name)
  );

  return [...numbered, ...unnumbered];
};

/**
 * Parse console text into the parent run and its spawned jobs.
 *
 * @example
 * ```typescript
 * parseSpawnedJobs("Starting building: AQA_Test_Pipeline #12");
 * // { parent: { name: "Unknown", ... },
 * //   spawned_jobs: [{ name: "AQA_Test_Pipeline", build_number: "12", url: null, result: null }] }
 * ```
 */
export const parseSpawnedJobs = (text: string): SpawnedJobsResult => {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  return {
    parent: extractParentInfo(lines),
    spawned_jobs: extractSpawnedJobs(lines),
  };
};
