import {
  countByType,
  type ExtractionResult,
  extractTriggers,
  serializeResult,
} from "@temurin-ci/parser";
import { defineCommand } from "citty";
import { readInputFile, writeOutputFile } from "../lib/files.js";
import { booleanArg, requireStringArg } from "../utils/args.js";
import { exitWithError } from "../utils/error.js";
import { formatBytes, formatCount } from "../utils/format.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface ExtractTriggersOptions {
  readonly input: string;
  readonly output: string;
  readonly verbose?: boolean;
  /** Mask secret-looking parameter values in the output */
  readonly redact?: boolean;
  readonly logger?: Logger;
}

/**
 * Read an HTML console log, extract its remote triggers and write them as
 * JSON. The summary is logged before the write so it survives a write
 * failure.
 */
export const runExtractTriggers = async (
  options: ExtractTriggersOptions
): Promise<ExtractionResult> => {
  const { input, output, redact = false } = options;
  const logger =
    options.logger ?? createLogger({ verbose: options.verbose ?? false });

  logger.phase("Read", `Reading ${input}`);
  const html = await readInputFile(input);
  logger.phase("Read", formatBytes(Buffer.byteLength(html, "utf-8")));

  const result = extractTriggers(html, {
    onAnomaly: ({ line, parser, message }) => {
      logger.debug(`skipped line ${line} (${parser}): ${message}`);
    },
  });

  const counts = countByType(result.remote_triggers);
  logger.phase(
    "Extract",
    `detailed=${counts.detailed} simple=${counts.simple} announcement=${counts.eclipse_temurin_announcement}`
  );
  logger.info(`Found ${formatCount(result.total_triggers, "remote trigger")}`);

  const bytes = await writeOutputFile(output, serializeResult(result, { redact }));
  logger.phase("Write", `Wrote ${formatBytes(bytes)} to ${output}`);

  return result;
};

export const extractTriggersCommand = defineCommand({
  meta: {
    name: "extract-triggers",
    description: "Extract remote trigger information from a Jenkins console log",
  },
  args: {
    input: {
      type: "string",
      description: "HTML console log to read",
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
    redact: {
      type: "boolean",
      description: "Replace secret-looking parameter values with [REDACTED]",
      default: false,
    },
  },
  run: async ({ args }) => {
    try {
      await runExtractTriggers({
        input: requireStringArg(args.input, "input"),
        output: requireStringArg(args.output, "output"),
        verbose: booleanArg(args.verbose),
        redact: booleanArg(args.redact),
      });
    } catch (error) {
      exitWithError(error);
    }
  },
});
