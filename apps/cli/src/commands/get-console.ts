import { defineCommand } from "citty";
import {
  loadConfig,
  maskToken,
  validatePipelineName,
  validateRunNumber,
  validateUrl,
} from "../lib/config.js";
import { ConfigError } from "../lib/errors.js";
import { writeOutputFile } from "../lib/files.js";
import {
  buildConsoleUrl,
  CONSOLE_FORMATS,
  type ConsoleFormat,
  fetchConsoleLog,
  isConsoleFormat,
} from "../lib/jenkins.js";
import { resolveToken } from "../lib/token.js";
import { booleanArg, requireStringArg, stringArg } from "../utils/args.js";
import { exitWithError } from "../utils/error.js";
import { formatBytes } from "../utils/format.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface GetConsoleOptions {
  /** Overrides JENKINS_URL */
  readonly url?: string;
  /** Overrides JENKINS_USERNAME */
  readonly username?: string;
  readonly token?: string;
  readonly tokenFile?: string;
  readonly pipelineName: string;
  readonly runNumber: string;
  readonly output: string;
  readonly format?: string;
  readonly verbose?: boolean;
  readonly logger?: Logger;
  readonly env?: Readonly<Record<string, string | undefined>>;
}

export interface GetConsoleResult {
  readonly url: string;
  readonly bytes: number;
}

const check = (result: { valid: boolean; error?: string }): void => {
  if (!result.valid) {
    throw new ConfigError(result.error ?? "invalid option");
  }
};

const parseFormat = (format: string | undefined): ConsoleFormat => {
  if (format === undefined) {
    return "text";
  }
  if (!isConsoleFormat(format)) {
    throw new ConfigError(
      `Unknown console format '${format}' (expected one of ${CONSOLE_FORMATS.join(", ")})`
    );
  }
  return format;
};

/**
 * Download a pipeline run's console log to a file.
 */
export const runGetConsole = async (
  options: GetConsoleOptions
): Promise<GetConsoleResult> => {
  const logger =
    options.logger ?? createLogger({ verbose: options.verbose ?? false });
  const config = loadConfig(options.env);

  const baseUrl = options.url ?? config.jenkinsUrl;
  const username = options.username ?? config.jenkinsUsername;
  check(validateUrl(baseUrl));
  check(validatePipelineName(options.pipelineName));
  check(validateRunNumber(options.runNumber));
  const runNumber = Number.parseInt(options.runNumber.trim(), 10);
  const format = parseFormat(options.format);

  const token = await resolveToken({
    token: options.token,
    tokenFile: options.tokenFile,
    envToken: config.jenkinsToken,
    envName: "JENKINS_TOKEN",
    service: "Jenkins",
  });
  if (token === undefined) {
    throw new ConfigError("Jenkins token is required");
  }

  logger.info(`Connecting to Jenkins server: ${baseUrl}`);
  logger.info(`Pipeline: ${options.pipelineName}`);
  logger.info(`Run number: ${runNumber}`);
  logger.info(`Output file: ${options.output}`);
  logger.debug(`Authenticating as ${username} with token ${maskToken(token)}`);
  logger.info(
    `Attempting to retrieve console log from: ${buildConsoleUrl(baseUrl, options.pipelineName, runNumber, format)}`
  );

  const log = await fetchConsoleLog({
    baseUrl,
    pipelineName: options.pipelineName,
    runNumber,
    format,
    credentials: { username, token },
  });

  const bytes = await writeOutputFile(options.output, log.content);
  logger.info(`Console log successfully written to: ${options.output}`);
  logger.info(`File size: ${formatBytes(bytes)}`);

  return { url: log.url, bytes };
};

export const getConsoleCommand = defineCommand({
  meta: {
    name: "get-console",
    description: "Download the console log of a Jenkins pipeline run",
  },
  args: {
    url: {
      type: "string",
      description: "Jenkins server URL (default: JENKINS_URL or https://ci.adoptium.net/)",
    },
    username: {
      type: "string",
      description: "Jenkins username (default: JENKINS_USERNAME or anonymous)",
    },
    token: {
      type: "string",
      description: "Jenkins API token (default: JENKINS_TOKEN)",
    },
    "token-file": {
      type: "string",
      description: "File containing the Jenkins API token",
    },
    "pipeline-name": {
      type: "string",
      description:
        "Pipeline name, folders separated by / (each folder gets its own job/ URL segment)",
      alias: "p",
      required: true,
    },
    "run-number": {
      type: "string",
      description: "Pipeline run number",
      alias: "r",
      required: true,
    },
    output: {
      type: "string",
      description: "File to write the console log to",
      alias: "o",
      required: true,
    },
    format: {
      type: "string",
      description: "Console format: text, html or timestamps",
      default: "text",
    },
    verbose: {
      type: "boolean",
      description: "Enable verbose output",
      alias: "V",
      default: false,
    },
  },
  run: async ({ args }) => {
    try {
      await runGetConsole({
        url: stringArg(args.url),
        username: stringArg(args.username),
        token: stringArg(args.token),
        tokenFile: stringArg(args["token-file"]),
        pipelineName: requireStringArg(args["pipeline-name"], "pipeline-name"),
        runNumber: requireStringArg(args["run-number"], "run-number"),
        output: requireStringArg(args.output, "output"),
        format: stringArg(args.format),
        verbose: booleanArg(args.verbose),
      });
    } catch (error) {
      exitWithError(error);
    }
  },
});
