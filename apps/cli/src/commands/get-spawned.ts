import {
  parseSpawnedJobs,
  type SpawnedJobsResult,
  toJsonDocument,
} from "@temurin-ci/parser";
import { defineCommand } from "citty";
import { readInputFile, writeOutputFile } from "../lib/files.js";
import { booleanArg, requireStringArg } from "../utils/args.js";
import { exitWithError } from "../utils/error.js";
import { formatCount } from "../utils/format.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface GetSpawnedOptions {
  readonly input: string;
  readonly output: string;
  readonly verbose?: boolean;
  readonly logger?: Logger;
}

/**
 * List the downstream jobs a pipeline run started, from its plain-text
 * console log.
 */
export const runGetSpawned = async (
  options: GetSpawnedOptions
): Promise<SpawnedJobsResult> => {
  const logger =
    options.logger ?? createLogger({ verbose: options.verbose ?? false });

  const text = await readInputFile(options.input);
  const result = parseSpawnedJobs(text);
  logger.debug(
    `parent ${result.parent.name} #${result.parent.build_number} on ${result.parent.node ?? "unknown node"}`
  );

  await writeOutputFile(options.output, toJsonDocument(result));
  logger.info(`Results written to ${options.output}`);
  logger.info(`Found ${formatCount(result.spawned_jobs.length, "spawned job")}`);

  return result;
};

export const getSpawnedCommand = defineCommand({
  meta: {
    name: "get-spawned",
    description: "List downstream jobs spawned by a pipeline run",
  },
  args: {
    input: {
      type: "string",
      description: "Plain-text console log to read",
      alias: "i",
      required: true,
    },
    output: {
      type: "string",
      description: "JSON file to write",
      alias: "o",
      required: true,
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
      await runGetSpawned({
        input: requireStringArg(args.input, "input"),
        output: requireStringArg(args.output, "output"),
        verbose: booleanArg(args.verbose),
      });
    } catch (error) {
      exitWithError(error);
    }
  },
});
