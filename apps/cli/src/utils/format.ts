/**
 * Formats a count with a singular or plural noun.
 *
 * Examples:
 * - (1, "trigger") -> "1 trigger"
 * - (3, "trigger") -> "3 triggers"
 * - (0, "job") -> "0 jobs"
 */
export const formatCount = (count: number, noun: string): string =>
  `${count} ${count === 1 ? noun : `${noun}s`}`;

/**
 * Formats a byte size for display.
 *
 * Examples:
 * - 512 -> "512 bytes"
 * - 2048 -> "2048 bytes (2.0 KiB)"
 * - 3145728 -> "3145728 bytes (3.0 MiB)"
 */
export const formatBytes = (bytes: number): string => {
  if (bytes < 1024) {
    return `${bytes} bytes`;
  }
  if (bytes < 1024 * 1024) {
    return `${bytes} bytes (${(bytes / 1024).toFixed(1)} KiB)`;
  }
  return `${bytes} bytes (${(bytes / (1024 * 1024)).toFixed(1)} MiB)`;
};
