/**
 * Simple remote-trigger parser.
 *
 * Matches a bare "Triggering remote job <target>" directive anywhere in a line,
 * where target is 'quoted', "quoted" or a single token. The plugin's own
 * "Triggering remote job now." progress line is not a target.
 */

import { BaseParser, type ParseContext, type ParseResult } from "../parser-types.js";
import type { SimpleTrigger } from "../types.js";
import { jobNameFromUrl } from "../utils.js";

const PARSER_ID = "simple";
const PARSER_PRIORITY = 80;

/**
 * Groups: 1=single-quoted target, 2=double-quoted target, 3=bare token
 */
const simpleTriggerPattern =
  /Triggering remote job\s+(?!now\.?(?:\s|$))(?:'([^']+)'|"([^"]+)"|(\S+))/i;

/** Sentence punctuation trailing a bare target */
const trailingPunctuationPattern = /[.,;]+$/;

/**
 * Extract the target specification from a line.
 */
const matchTarget = (line: string): string | undefined => {
  const match = simpleTriggerPattern.exec(line);
  if (!match) {
    return undefined;
  }
  const quoted = match[1] ?? match[2];
  if (quoted !== undefined) {
    return quoted.trim() || undefined;
  }
  const bare = match[3]?.replace(trailingPunctuationPattern, "");
  return bare ? bare : undefined;
};

/**
 * SimpleTriggerParser produces one SimpleTrigger per matching line.
 */
export class SimpleTriggerParser extends BaseParser {
  readonly id = PARSER_ID;
  readonly priority = PARSER_PRIORITY;

  canParse(line: string, _ctx: ParseContext): number {
    return matchTarget(line) === undefined ? 0 : 0.9;
  }

  parse(line: string, ctx: ParseContext): ParseResult {
    const target = matchTarget(line);
    if (target === undefined) {
      return null;
    }
    const record: SimpleTrigger = {
      trigger_type: "simple",
      job_name: jobNameFromUrl(target) ?? target,
      target,
      line: ctx.lineNumber,
    };
    return record;
  }
}

export const createSimpleParser = (): SimpleTriggerParser =>
  new SimpleTriggerParser();
