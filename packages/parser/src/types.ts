/**
 * Core types for remote-trigger extraction.
 */

// ============================================================================
// Trigger Types
// ============================================================================

/**
 * TriggerType discriminates the three remote-trigger record shapes.
 */
export type TriggerType = "eclipse_temurin_announcement" | "simple" | "detailed";

// ============================================================================
// Trigger Records
// ============================================================================

/**
 * Build parameters keyed by name (PLATFORMS, JDK_VERSION, TARGETS, ...).
 */
export type TriggerParameters = Record<string, string>;

/**
 * A typed trailer value. Text that fails to convert is kept as written.
 */
export type Coerced<T> = T | string;

/**
 * AnnouncementTrigger is an Eclipse Temurin AQA test trigger announcement.
 */
export interface AnnouncementTrigger {
  readonly trigger_type: "eclipse_temurin_announcement";
  readonly job_name: string;
  readonly timestamp: string;
  readonly parameters: TriggerParameters;
}

/**
 * SimpleTrigger is a remote-trigger directive with a bare target and no
 * parameter block.
 */
export interface SimpleTrigger {
  readonly trigger_type: "simple";
  readonly job_name: string;
  readonly target: string;
  /** 1-based line number in the plain-text transcript */
  readonly line: number;
}

/**
 * DetailedTrigger is a Parameterized Remote Trigger configuration block.
 */
export interface DetailedTrigger {
  readonly trigger_type: "detailed";
  readonly job_name: string;
  readonly remote_jenkins_name?: string;
  readonly parameters: TriggerParameters;
  readonly block_build_until_complete?: Coerced<boolean>;
  readonly connection_retry_limit?: Coerced<number>;
  readonly trust_all_certificates?: Coerced<boolean>;
  readonly remote_job_url?: string;
  readonly authentication_user?: string;
  readonly csrf_protection_enabled?: Coerced<boolean>;
  readonly remote_build_url?: string;
  readonly remote_build_result?: string;
}

export type TriggerRecord = AnnouncementTrigger | SimpleTrigger | DetailedTrigger;

// ============================================================================
// Extraction Result
// ============================================================================

/**
 * ExtractionResult is the document written by extract-triggers.
 * total_triggers always equals remote_triggers.length.
 */
export interface ExtractionResult {
  readonly remote_triggers: readonly TriggerRecord[];
  readonly total_triggers: number;
}

/**
 * Create an ExtractionResult from records in transcript order.
 */
export const createExtractionResult = (
  triggers: readonly TriggerRecord[]
): ExtractionResult => ({
  remote_triggers: [...triggers],
  total_triggers: triggers.length,
});

// ============================================================================
// Counting
// ============================================================================

/**
 * Count records per trigger type. Every type is present, zero when unseen.
 */
export const countByType = (
  triggers: readonly TriggerRecord[]
): Record<TriggerType, number> => {
  const counts: Record<TriggerType, number> = {
    detailed: 0,
    simple: 0,
    eclipse_temurin_announcement: 0,
  };
  for (const t of triggers) {
    counts[t.trigger_type]++;
  }
  return counts;
};
