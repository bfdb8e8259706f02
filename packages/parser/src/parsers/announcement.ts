/**
 * Eclipse Temurin AQA test trigger announcement parser.
 *
 * Format (timestamp stripped by the context parser):
 *   [2025-07-15T10:23:45Z] Eclipse Temurin AQA test trigger: AQA_Test_Pipeline PLATFORMS=x86-64_linux
 *   [2025-07-15T10:23:45Z]   JDK_VERSION=21 TARGETS=sanity.openjdk
 *
 * Lines made only of KEY=VALUE tokens directly after the announcement are
 * continuation lines.
 */

import {
  MalformedTriggerError,
  MultiLineParser,
  type ParseContext,
  type ParseResult,
} from "../parser-types.js";
import type { AnnouncementTrigger, TriggerParameters } from "../types.js";
import { parseKeyValueTokens } from "../utils.js";

const PARSER_ID = "announcement";
const PARSER_PRIORITY = 70;

export const ANNOUNCEMENT_MARKER = "Eclipse Temurin AQA test trigger";

/**
 * Groups: 1=text after the colon
 */
const announcementPattern = /Eclipse Temurin AQA test trigger\s*:\s*(.*)$/i;

/** Parameter names that may carry the job when no bare token does */
const jobParameterKeys: readonly string[] = ["job", "JOB_NAME"];

interface PendingAnnouncement {
  timestamp: string;
  jobName: string;
  parameters: TriggerParameters;
}

/**
 * Split the announcement text into its job name and inline parameters.
 */
const parseAnnouncementBody = (
  body: string
): { jobName?: string; parameters: TriggerParameters } => {
  const parameters: TriggerParameters = {};
  let jobName: string | undefined;

  for (const token of body.trim().split(/\s+/)) {
    if (token === "") {
      continue;
    }
    const pair = parseKeyValueTokens(token);
    if (pair) {
      Object.assign(parameters, pair);
    } else if (jobName === undefined) {
      jobName = token;
    }
  }

  if (jobName === undefined) {
    jobName = jobParameterKeys
      .map((key) => parameters[key])
      .find((value) => value !== undefined && value !== "");
  }

  return { jobName, parameters };
};

/**
 * AnnouncementParser collects one announcement and its continuation lines.
 */
export class AnnouncementParser extends MultiLineParser {
  readonly id = PARSER_ID;
  readonly priority = PARSER_PRIORITY;

  private pending: PendingAnnouncement | undefined;

  canParse(line: string, ctx: ParseContext): number {
    if (!ctx.timestamp) {
      return 0;
    }
    return announcementPattern.test(line) ? 0.8 : 0;
  }

  parse(line: string, ctx: ParseContext): ParseResult {
    const match = announcementPattern.exec(line);
    if (!(match && ctx.timestamp)) {
      return null;
    }

    const { jobName, parameters } = parseAnnouncementBody(match[1] ?? "");
    if (!jobName) {
      throw new MalformedTriggerError(
        `${ANNOUNCEMENT_MARKER} announcement at line ${ctx.lineNumber} names no job`,
        ctx.lineNumber
      );
    }

    this.pending = { timestamp: ctx.timestamp, jobName, parameters };
    return null;
  }

  continueMultiLine(line: string, _ctx: ParseContext): boolean {
    if (!this.pending) {
      return false;
    }
    const continuation = parseKeyValueTokens(line);
    if (!continuation) {
      return false;
    }
    Object.assign(this.pending.parameters, continuation);
    return true;
  }

  finishMultiLine(_ctx: ParseContext): ParseResult {
    const pending = this.pending;
    this.pending = undefined;
    if (!pending) {
      return null;
    }
    const record: AnnouncementTrigger = {
      trigger_type: "eclipse_temurin_announcement",
      job_name: pending.jobName,
      timestamp: pending.timestamp,
      parameters: pending.parameters,
    };
    return record;
  }

  reset(): void {
    this.pending = undefined;
  }
}

export const createAnnouncementParser = (): AnnouncementParser =>
  new AnnouncementParser();
