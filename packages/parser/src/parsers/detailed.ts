/**
 * Detailed trigger parser for Parameterized Remote Trigger configuration
 * blocks.
 *
 * Block format (one item per line, leading whitespace ignored):
 *
 *   Parameterized Remote Trigger Configuration:
 *     - job: AQA_Test_Pipeline
 *     - remoteJenkinsName: temurin-compliance
 *     - parameters: [SDK_RESOURCE=customized, PLATFORMS=x86-64_linux]
 *     - blockBuildUntilComplete: true
 *     - connectionRetryLimit: 5
 *     - trustAllCertificates: false
 *   ################################################################
 *   Triggering parameterized remote job 'https://host/job/AQA_Test_Pipeline'
 *     Using 'Credentials Authentication' as user 'temurin-bot' (Credentials ID 'cred')
 *     CSRF protection is disabled on the remote server.
 *     Remote build URL: https://host/job/AQA_Test_Pipeline/42/
 *
 * Bare KEY=VALUE lines add to the parameters, and a list may continue over
 * several lines. A bare "Triggering remote job X" line before the remote
 * job URL belongs to the block. The block ends at the first line that is
 * none of the above; blank lines neither add nor end.
 */

import {
  MalformedTriggerError,
  MultiLineParser,
  type ParseContext,
  type ParseResult,
} from "../parser-types.js";
import type { Coerced, DetailedTrigger, TriggerParameters } from "../types.js";
import {
  firstQuotedOrToken,
  parseBoolean,
  parseInteger,
  splitParameterList,
} from "../utils.js";

// ============================================================================
// Constants
// ============================================================================

const PARSER_ID = "detailed";

/**
 * Priority 90: configuration blocks are the most specific shape and must
 * not be captured as simple triggers.
 */
const PARSER_PRIORITY = 90;

export const CONFIGURATION_HEADER = "Parameterized Remote Trigger Configuration:";

// ============================================================================
// Block Patterns
// ============================================================================

/**
 * Configuration item.
 * Format: - key: value
 * Groups: 1=key, 2=value
 */
const configItemPattern = /^-\s*([A-Za-z][A-Za-z0-9_]*)\s*:\s*(.*)$/;

/**
 * Parameter line. Format: KEY=VALUE[, KEY=VALUE...]
 */
const parameterLinePattern = /^[A-Za-z_][A-Za-z0-9_.-]*\s*=/;

/** Separator rows printed around the configuration */
const separatorPattern = /^[#=-]{3,}$/;

/**
 * Groups: 1=rest of line (quoted URL or bare URL)
 */
const triggeringPattern = /^Triggering parameterized remote job\s+(.+)$/i;

/**
 * Groups: 1=remote host name
 */
const remoteHostPattern = /^Using globally defined 'Remote Host' with name '([^']+)'/i;

/**
 * Groups: 1=user
 */
const authUserPattern = /\bas user '([^']+)'/i;

const usingAuthPattern = /^Using '[^']*' as user '/i;

/**
 * Groups: 1=enabled|disabled
 */
const csrfPattern = /^CSRF protection is (enabled|disabled)\b/i;

/**
 * Groups: 1=URL
 */
const remoteBuildUrlPattern = /^Remote build URL:\s*(\S+)/i;

/**
 * Groups: 1=result
 */
const remoteBuildResultPattern =
  /^Remote build finished with status\s+([A-Za-z_]+)/i;

/**
 * Bare remote-job directive. Before the remote job URL is printed it is
 * part of the block, not a separate trigger.
 */
const remoteJobDirectivePattern =
  /Triggering remote job\s+(?!now\.?(?:\s|$))\S/i;

/**
 * Plugin progress sentences that belong to the block but carry no field.
 */
const progressPrefixes: readonly string[] = [
  "triggering remote job now",
  "remote job queue number",
  "remote build started",
  "waiting for remote build",
  "remote build is",
  "remote build not yet",
  "queued remote job",
];

// ============================================================================
// Block State
// ============================================================================

interface BlockState {
  startLine: number;
  jobName?: string;
  remoteJenkinsName?: string;
  parameters: TriggerParameters;
  blockBuildUntilComplete?: Coerced<boolean>;
  connectionRetryLimit?: Coerced<number>;
  trustAllCertificates?: Coerced<boolean>;
  remoteJobUrl?: string;
  authenticationUser?: string;
  csrfProtectionEnabled?: Coerced<boolean>;
  remoteBuildUrl?: string;
  remoteBuildResult?: string;
}

const createBlockState = (startLine: number): BlockState => ({
  startLine,
  parameters: {},
});

/**
 * Convert accumulated block state into a record, omitting absent fields.
 */
const toDetailedTrigger = (
  state: BlockState,
  jobName: string
): DetailedTrigger => ({
  trigger_type: "detailed",
  job_name: jobName,
  ...(state.remoteJenkinsName !== undefined && {
    remote_jenkins_name: state.remoteJenkinsName,
  }),
  parameters: { ...state.parameters },
  ...(state.blockBuildUntilComplete !== undefined && {
    block_build_until_complete: state.blockBuildUntilComplete,
  }),
  ...(state.connectionRetryLimit !== undefined && {
    connection_retry_limit: state.connectionRetryLimit,
  }),
  ...(state.trustAllCertificates !== undefined && {
    trust_all_certificates: state.trustAllCertificates,
  }),
  ...(state.remoteJobUrl !== undefined && {
    remote_job_url: state.remoteJobUrl,
  }),
  ...(state.authenticationUser !== undefined && {
    authentication_user: state.authenticationUser,
  }),
  ...(state.csrfProtectionEnabled !== undefined && {
    csrf_protection_enabled: state.csrfProtectionEnabled,
  }),
  ...(state.remoteBuildUrl !== undefined && {
    remote_build_url: state.remoteBuildUrl,
  }),
  ...(state.remoteBuildResult !== undefined && {
    remote_build_result: state.remoteBuildResult,
  }),
});

// ============================================================================
// Detailed Trigger Parser
// ============================================================================

/**
 * DetailedTriggerParser accumulates a configuration block into one
 * DetailedTrigger record.
 */
export class DetailedTriggerParser extends MultiLineParser {
  readonly id = PARSER_ID;
  readonly priority = PARSER_PRIORITY;

  private block: BlockState | undefined;

  canParse(line: string, _ctx: ParseContext): number {
    return line.includes(CONFIGURATION_HEADER) ? 1 : 0;
  }

  parse(line: string, ctx: ParseContext): ParseResult {
    const index = line.indexOf(CONFIGURATION_HEADER);
    if (index === -1) {
      return null;
    }

    const block = createBlockState(ctx.lineNumber);
    this.block = block;

    // Text after the header on the same line is the first block item
    const rest = line.slice(index + CONFIGURATION_HEADER.length).trim();
    if (rest !== "") {
      this.consume(block, rest);
    }
    return null;
  }

  continueMultiLine(line: string, _ctx: ParseContext): boolean {
    if (!this.block) {
      return false;
    }
    const trimmed = line.trim();
    if (trimmed === "") {
      return true;
    }
    return this.consume(this.block, trimmed);
  }

  finishMultiLine(_ctx: ParseContext): ParseResult {
    const block = this.block;
    this.block = undefined;
    if (!block) {
      return null;
    }
    if (!block.jobName) {
      throw new MalformedTriggerError(
        `remote trigger configuration at line ${block.startLine} names no job`,
        block.startLine
      );
    }
    return toDetailedTrigger(block, block.jobName);
  }

  reset(): void {
    this.block = undefined;
  }

  /**
   * Apply one trimmed line to the block.
   * Returns false if the line is not part of the block grammar.
   */
  private consume(block: BlockState, line: string): boolean {
    const item = configItemPattern.exec(line);
    if (item?.[1] !== undefined) {
      this.applyConfigItem(block, item[1], item[2] ?? "");
      return true;
    }

    if (parameterLinePattern.test(line)) {
      Object.assign(block.parameters, splitParameterList(line));
      return true;
    }

    if (separatorPattern.test(line)) {
      return true;
    }

    return this.applyTrailer(block, line);
  }

  private applyConfigItem(block: BlockState, key: string, value: string): void {
    const trimmed = value.trim();
    switch (key) {
      case "job":
        block.jobName = trimmed || block.jobName;
        return;
      case "remoteJenkinsName":
        block.remoteJenkinsName = trimmed || block.remoteJenkinsName;
        return;
      case "parameters":
        Object.assign(block.parameters, splitParameterList(trimmed));
        return;
      case "blockBuildUntilComplete":
        block.blockBuildUntilComplete = parseBoolean(trimmed);
        return;
      case "connectionRetryLimit":
        block.connectionRetryLimit = parseInteger(trimmed);
        return;
      case "trustAllCertificates":
        block.trustAllCertificates = parseBoolean(trimmed);
        return;
      case "auth":
        block.authenticationUser =
          authUserPattern.exec(trimmed)?.[1] ?? block.authenticationUser;
        return;
      case "csrfProtection":
        block.csrfProtectionEnabled = parseBoolean(trimmed);
        return;
      default:
        block.parameters[key] = trimmed;
    }
  }

  private applyTrailer(block: BlockState, line: string): boolean {
    const triggering = triggeringPattern.exec(line);
    if (triggering?.[1]) {
      block.remoteJobUrl = firstQuotedOrToken(triggering[1]);
      return true;
    }

    const remoteHost = remoteHostPattern.exec(line);
    if (remoteHost?.[1]) {
      block.remoteJenkinsName ??= remoteHost[1];
      return true;
    }

    if (usingAuthPattern.test(line)) {
      block.authenticationUser ??= authUserPattern.exec(line)?.[1];
      return true;
    }

    const csrf = csrfPattern.exec(line);
    if (csrf?.[1]) {
      block.csrfProtectionEnabled = csrf[1].toLowerCase() === "enabled";
      return true;
    }

    const buildUrl = remoteBuildUrlPattern.exec(line);
    if (buildUrl?.[1]) {
      block.remoteBuildUrl = buildUrl[1];
      return true;
    }

    const buildResult = remoteBuildResultPattern.exec(line);
    if (buildResult?.[1]) {
      block.remoteBuildResult = buildResult[1].toUpperCase();
      return true;
    }

    if (
      block.remoteJobUrl === undefined &&
      remoteJobDirectivePattern.test(line)
    ) {
      return true;
    }

    const lower = line.toLowerCase();
    return progressPrefixes.some((prefix) => lower.startsWith(prefix));
  }
}

/**
 * Create a new detailed trigger parser.
 */
export const createDetailedParser = (): DetailedTriggerParser =>
  new DetailedTriggerParser();
