import { defineCommand } from "citty";
import { loadConfig } from "../lib/config.js";
import { ConfigError } from "../lib/errors.js";
import { type CreatedIssue, createIssue } from "../lib/github.js";
import {
  buildReleaseIssue,
  extractMajorVersion,
  parseLabels,
  type ReleaseIssue,
} from "../lib/release-template.js";
import { resolveToken } from "../lib/token.js";
import { booleanArg, requireStringArg, stringArg } from "../utils/args.js";
import { exitWithError } from "../utils/error.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface CreateReleaseIssueOptions {
  readonly month: string;
  readonly year: string;
  readonly version: string;
  readonly repoOwner: string;
  readonly repoName: string;
  readonly token?: string;
  readonly tokenFile?: string;
  /** Comma-separated */
  readonly labels?: string;
  readonly dryRun?: boolean;
  readonly verbose?: boolean;
  readonly logger?: Logger;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export interface CreateReleaseIssueResult {
  readonly issue: ReleaseIssue;
  /** Undefined for a dry run */
  readonly created?: CreatedIssue;
}

const printPreview = (
  repository: string,
  { title, body, labels }: ReleaseIssue
): void => {
  console.log("\n=== DRY RUN: Preview of GitHub Issue ===");
  console.log(`Repository: ${repository}`);
  console.log(`Title: ${title}`);
  if (labels.length > 0) {
    console.log(`Labels: ${labels.join(", ")}`);
  }
  console.log(`\nBody:\n${body}`);
  console.log("\n=== End of Preview ===");
};

const printCreated = (issue: CreatedIssue, labels: readonly string[]): void => {
  console.log("\n✓ Successfully created GitHub issue!");
  console.log(`Issue #${issue.number}: ${issue.title}`);
  console.log(`URL: ${issue.htmlUrl}`);
  if (labels.length > 0) {
    console.log(`Labels: ${labels.join(", ")}`);
  }
};

/**
 * Build the release tracking issue and file it, or preview it on a dry run.
 * A dry run needs no token.
 */
export const runCreateReleaseIssue = async (
  options: CreateReleaseIssueOptions
): Promise<CreateReleaseIssueResult> => {
  const logger =
    options.logger ?? createLogger({ verbose: options.verbose ?? false });
  const config = loadConfig(options.env);
  const dryRun = options.dryRun ?? false;

  const token = await resolveToken(
    {
      token: options.token,
      tokenFile: options.tokenFile,
      envToken: config.githubToken,
      envName: "GITHUB_TOKEN",
      service: "GitHub",
    },
    { required: !dryRun }
  );

  if (extractMajorVersion(options.version) === undefined) {
    logger.warn(`Could not extract major version from: ${options.version}`);
  }

  const issue = buildReleaseIssue({
    month: options.month,
    year: options.year,
    version: options.version,
    labels: parseLabels(options.labels),
  });
  logger.info(`Generated issue title: ${issue.title}`);
  logger.debug(`Generated issue body:\n${issue.body}`);

  const repository = `${options.repoOwner}/${options.repoName}`;
  if (dryRun) {
    printPreview(repository, issue);
    return { issue };
  }

  if (token === undefined) {
    throw new ConfigError("GitHub token is required");
  }

  logger.info(`Creating GitHub issue in ${repository}`);
  const created = await createIssue({
    apiUrl: config.githubApiUrl,
    owner: options.repoOwner,
    repo: options.repoName,
    token,
    title: issue.title,
    body: issue.body,
    labels: issue.labels,
  });
  printCreated(created, issue.labels);

  return { issue, created };
};

export const createReleaseIssueCommand = defineCommand({
  meta: {
    name: "create-release-issue",
    description: "Create a GitHub release tracking issue from the template",
  },
  args: {
    month: {
      type: "string",
      description: "Release month name (e.g. July)",
      required: true,
    },
    year: {
      type: "string",
      description: "Release year (e.g. 2025)",
      required: true,
    },
    version: {
      type: "string",
      description: "JDK version (e.g. 21.0.4+7, 8u462-b06)",
      required: true,
    },
    "repo-owner": {
      type: "string",
      description: "GitHub repository owner or organization",
      required: true,
    },
    "repo-name": {
      type: "string",
      description: "GitHub repository name",
      required: true,
    },
    token: {
      type: "string",
      description: "GitHub personal access token (default: GITHUB_TOKEN)",
    },
    "token-file": {
      type: "string",
      description: "File containing the GitHub token",
    },
    labels: {
      type: "string",
      description: "Comma-separated labels to add to the issue",
    },
    "dry-run": {
      type: "boolean",
      description: "Preview the issue without creating it",
      default: false,
    },
    verbose: {
      type: "boolean",
      description: "Enable verbose output",
      alias: "v",
      default: false,
    },
  },
  run: async ({ args }) => {
    try {
      await runCreateReleaseIssue({
        month: requireStringArg(args.month, "month"),
        year: requireStringArg(args.year, "year"),
        version: requireStringArg(args.version, "version"),
        repoOwner: requireStringArg(args["repo-owner"], "repo-owner"),
        repoName: requireStringArg(args["repo-name"], "repo-name"),
        token: stringArg(args.token),
        tokenFile: stringArg(args["token-file"]),
        labels: stringArg(args.labels),
        dryRun: booleanArg(args["dry-run"]),
        verbose: booleanArg(args.verbose),
      });
    } catch (error) {
      exitWithError(error);
    }
  },
});
