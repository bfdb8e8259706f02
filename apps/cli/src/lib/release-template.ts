/**
 * Release tracking issue template.
 *
 * One table row per platform. Major platforms run the full manual test set
 * ("All", "run"); the rest are skipped by default.
 */

export interface Platform {
  readonly name: string;
  readonly isMajor: boolean;
}

export const DEFAULT_PLATFORMS: readonly Platform[] = [
  { name: "Alpine Linux aarch64", isMajor: true },
  { name: "Alpine Linux x64", isMajor: false },
  { name: "Linux aarch64", isMajor: true },
  { name: "Linux armv7l", isMajor: false },
  { name: "Linux ppc64le", isMajor: false },
  { name: "Linux s390x", isMajor: false },
  { name: "Linux x64", isMajor: true },
  { name: "macOS aarch64", isMajor: true },
  { name: "macOS x64", isMajor: true },
  { name: "Windows aarch64", isMajor: false },
  { name: "Windows x64", isMajor: true },
  { name: "Windows x86-32", isMajor: false },
];

/** Placeholder major version when none can be read */
export const UNKNOWN_MAJOR_VERSION = "X";

export interface ReleaseIssue {
  readonly title: string;
  readonly body: string;
  readonly labels: readonly string[];
}

export interface ReleaseIssueOptions {
  readonly month: string;
  readonly year: string;
  readonly version: string;
  readonly labels?: readonly string[];
  readonly platforms?: readonly Platform[];
}

/**
 * Leading digits of a version ("21.0.5+11" -> "21"), or undefined.
 */
export const extractMajorVersion = (version: string): string | undefined =>
  /^(\d+)/.exec(version.trim())?.[1];

/**
 * Split a comma-separated label list, dropping empty entries.
 */
export const parseLabels = (labels: string | undefined): string[] =>
  (labels ?? "")
    .split(",")
    .map((label) => label.trim())
    .filter((label) => label !== "");

export const releaseIssueTitle = (
  month: string,
  year: string,
  version: string
): string => `${month} ${year} JDK: ${version}`;

const tableHeader = (major: string): string =>
  `| Platform            | JDK${major} | Status :white_check_mark: | Jenkins job Owner | Auto-manuals Owner | Interactives Owner | Build links | Results Comment Link |\n` +
  "| ------------------- | ---------- | ----- | ----- | ----- | ----- | ----- | ----- |";

const platformRow = ({ name, isMajor }: Platform): string =>
  isMajor
    ? `| **${name}**       | All        |  |  |  | run | JDK / JRE | Results |`
    : `| ${name}         |   |  |  |  | skip | JDK / JRE | Results |`;

/**
 * Render the issue body for a major version.
 */
export const releaseIssueBody = (
  major: string,
  platforms: readonly Platform[] = DEFAULT_PLATFORMS
): string =>
  `### JDK${major}\n\n${[tableHeader(major), ...platforms.map(platformRow)].join("\n")}`;

/**
 * Build the full release issue. The major version falls back to
 * UNKNOWN_MAJOR_VERSION; callers check extractMajorVersion to warn.
 */
export const buildReleaseIssue = (
  options: ReleaseIssueOptions
): ReleaseIssue => {
  const major = extractMajorVersion(options.version) ?? UNKNOWN_MAJOR_VERSION;
  return {
    title: releaseIssueTitle(options.month, options.year, options.version),
    body: releaseIssueBody(major, options.platforms),
    labels: options.labels ?? [],
  };
};
