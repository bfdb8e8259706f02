/**
 * Parser registry for trigger parsers.
 */

import type { ParseContext, TriggerParser } from "./parser-types.js";
import { createParseContext } from "./parser-types.js";

/**
 * Shared empty context used when findParser is called without one.
 */
const emptyParseContext: ParseContext = Object.freeze(createParseContext());

// ============================================================================
// Parser Registry
// ============================================================================

/**
 * ParserRegistry holds trigger parsers in priority order and picks the one
 * that should classify a line.
 */
export class ParserRegistry {
  private readonly parsers: TriggerParser[] = [];
  private readonly byID: Map<string, TriggerParser> = new Map();

  /**
   * Register a parser with the registry.
   * Parsers are kept sorted by priority (highest first). Registering a
   * second parser with the same ID replaces the first.
   */
  register(parser: TriggerParser): void {
    const existing = this.byID.get(parser.id);
    if (existing) {
      this.parsers.splice(this.parsers.indexOf(existing), 1);
    }
    this.parsers.push(parser);
    this.byID.set(parser.id, parser);

    // Sort by priority descending (highest priority first)
    this.parsers.sort((a, b) => b.priority - a.priority);
  }

  /**
   * Get a parser by ID, or undefined if not found.
   */
  get(id: string): TriggerParser | undefined {
    return this.byID.get(id);
  }

  /**
   * Find the parser with the highest confidence for a line.
   * Parsers are visited in priority order and only a strictly higher score
   * replaces the current best, so equal scores go to the higher priority.
   */
  findParser(line: string, ctx?: ParseContext): TriggerParser | undefined {
    let best: TriggerParser | undefined;
    let bestScore = 0;

    const effectiveCtx = ctx ?? emptyParseContext;
    for (const p of this.parsers) {
      const score = p.canParse(line, effectiveCtx);
      if (score > bestScore) {
        bestScore = score;
        best = p;
      }
    }

    return best;
  }

  /**
   * Reset the state of all registered parsers.
   * Should be called between transcripts.
   */
  resetAll(): void {
    for (const p of this.parsers) {
      p.reset();
    }
  }

  /**
   * Get all registered parsers in priority order.
   */
  allParsers(): readonly TriggerParser[] {
    return this.parsers;
  }

  /**
   * Registered parser IDs in priority order.
   */
  parserIDs(): string[] {
    return this.parsers.map((p) => p.id);
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a new empty parser registry.
 */
export const createRegistry = (): ParserRegistry => new ParserRegistry();
