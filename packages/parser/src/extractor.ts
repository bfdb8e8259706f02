/**
 * Main extraction engine: a single pass over the transcript that routes each
 * line to the registry's trigger parsers.
 */

import type { ContextParser, ParseLineResult } from "./context/types.js";
import type { ParseContext, ParseResult, TriggerParser } from "./parser-types.js";
import { createParseContext } from "./parser-types.js";
import type { ParserRegistry } from "./registry.js";
import type { TriggerRecord } from "./types.js";

// ============================================================================
// Constants
// ============================================================================

/** Maximum line length to prevent ReDoS on extremely long lines */
export const maxLineLength = 65_536; // 64KB per line

// ============================================================================
// Anomaly Reporting
// ============================================================================

/**
 * ExtractionAnomaly describes a line that was skipped instead of producing
 * a record.
 */
export interface ExtractionAnomaly {
  /** 1-based line number in the transcript */
  readonly line: number;
  /** ID of the parser involved, or "context" for the context parser */
  readonly parser: string;
  readonly message: string;
}

/**
 * AnomalyReporter is a callback for skipped lines. The CLI injects its
 * debug logger here so the parser package does not depend on it.
 */
export type AnomalyReporter = (anomaly: ExtractionAnomaly) => void;

export interface ExtractOptions {
  readonly onAnomaly?: AnomalyReporter;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// ============================================================================
// Extractor Class
// ============================================================================

/**
 * Extractor uses the parser registry to extract trigger records from a
 * plain-text console transcript.
 */
export class Extractor {
  private readonly registry: ParserRegistry;

  constructor(registry: ParserRegistry) {
    this.registry = registry;
  }

  /**
   * Extract trigger records in transcript order.
   *
   * While a multi-line parser is active it sees every line first. A line it
   * does not consume closes the record and is then classified like any
   * other line, so a block directly followed by another trigger yields both.
   * A line that makes a parser throw is reported and skipped.
   */
  // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: main extraction loop handles multi-line parsers, context tracking and error recovery in a single pass
  extract(
    text: string,
    ctxParser: ContextParser,
    options: ExtractOptions = {}
  ): TriggerRecord[] {
    const records: TriggerRecord[] = [];
    const parseCtx: ParseContext = createParseContext();
    const report = options.onAnomaly;

    this.registry.resetAll();

    // Track active multi-line parser
    let activeParser: TriggerParser | undefined;

    const finish = (parser: TriggerParser): void => {
      let found: ParseResult = null;
      try {
        found = parser.finishMultiLine(parseCtx);
      } catch (error) {
        parser.reset();
        report?.({
          line: parseCtx.lineNumber,
          parser: parser.id,
          message: errorMessage(error),
        });
      }
      if (found) {
        records.push(found);
      }
    };

    const lines = text.replace(/\r\n?/g, "\n").split("\n");

    for (const [index, line] of lines.entries()) {
      parseCtx.lineNumber = index + 1;

      // Skip extremely long lines to prevent ReDoS
      if (line.length > maxLineLength) {
        report?.({
          line: parseCtx.lineNumber,
          parser: "context",
          message: `line longer than ${maxLineLength} characters skipped`,
        });
        continue;
      }

      let parsedLine: ParseLineResult;
      try {
        parsedLine = ctxParser.parseLine(line);
      } catch (error) {
        report?.({
          line: parseCtx.lineNumber,
          parser: "context",
          message: errorMessage(error),
        });
        continue;
      }
      const { ctx, cleanLine, skip } = parsedLine;
      if (skip) {
        continue;
      }
      parseCtx.timestamp = ctx.timestamp;

      if (activeParser) {
        if (activeParser.continueMultiLine(cleanLine, parseCtx)) {
          continue; // Line consumed by multi-line parser
        }
        // Record ended at this line; finish it and classify the line below
        finish(activeParser);
        activeParser = undefined;
      }

      const parser = this.registry.findParser(cleanLine, parseCtx);
      if (!parser) {
        continue;
      }

      try {
        const found = parser.parse(cleanLine, parseCtx);
        if (found) {
          records.push(found);
        } else if (parser.supportsMultiLine()) {
          activeParser = parser;
        }
      } catch (error) {
        parser.reset();
        report?.({
          line: parseCtx.lineNumber,
          parser: parser.id,
          message: errorMessage(error),
        });
      }
    }

    // Finalize any pending multi-line parser
    if (activeParser) {
      finish(activeParser);
    }

    return records;
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a new Extractor with the given registry.
 */
export const createExtractor = (registry: ParserRegistry): Extractor =>
  new Extractor(registry);
