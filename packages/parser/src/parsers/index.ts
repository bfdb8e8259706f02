/**
 * Trigger CONTENT parsers.
 *
 * Each parser recognizes one remote-trigger shape in the cleaned console
 * line, independent of the log format.
 *
 * Parser priorities (higher = checked first, wins ties):
 * - Detailed (90): Parameterized Remote Trigger configuration blocks
 * - Simple (80): bare "Triggering remote job <target>" directives
 * - Announcement (70): Eclipse Temurin AQA test trigger announcements
 *
 * For console context parsers (log FORMAT), see ../context/
 */

export {
  ANNOUNCEMENT_MARKER,
  AnnouncementParser,
  createAnnouncementParser,
} from "./announcement.js";
export {
  CONFIGURATION_HEADER,
  createDetailedParser,
  DetailedTriggerParser,
} from "./detailed.js";
export { createSimpleParser, SimpleTriggerParser } from "./simple.js";
