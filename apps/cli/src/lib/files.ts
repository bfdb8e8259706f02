/**
 * Input and output file handling for commands.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { InputError, OutputError } from "./errors.js";

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Offset of the first byte that does not start a well-formed UTF-8
 * sequence, or undefined if the buffer is valid.
 * Rejects overlong encodings, surrogates and code points above U+10FFFF.
 */
export const findInvalidUtf8Offset = (
  bytes: Uint8Array
): number | undefined => {
  let i = 0;
  while (i < bytes.length) {
    const lead = bytes[i] ?? 0;
    if (lead < 0x80) {
      i++;
      continue;
    }

    let trailing: number;
    let lower = 0x80;
    let upper = 0xbf;
    if (lead >= 0xc2 && lead <= 0xdf) {
      trailing = 1;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      trailing = 2;
      if (lead === 0xe0) {
        lower = 0xa0;
      } else if (lead === 0xed) {
        upper = 0x9f;
      }
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      trailing = 3;
      if (lead === 0xf0) {
        lower = 0x90;
      } else if (lead === 0xf4) {
        upper = 0x8f;
      }
    } else {
      return i;
    }

    for (let k = 1; k <= trailing; k++) {
      if (i + k >= bytes.length) {
        return i;
      }
      const next = bytes[i + k] ?? 0;
      if (next < lower || next > upper) {
        return i;
      }
      // Only the first continuation byte has a narrowed range
      lower = 0x80;
      upper = 0xbf;
    }
    i += trailing + 1;
  }
  return undefined;
};

/**
 * Decode bytes as strict UTF-8. A leading byte-order mark is dropped.
 */
export const decodeUtf8 = (bytes: Uint8Array, source: string): string => {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    const offset = findInvalidUtf8Offset(bytes);
    throw new InputError(
      offset === undefined
        ? `Input file '${source}' could not be decoded as UTF-8`
        : `Input file '${source}' is not valid UTF-8: invalid byte sequence at offset ${offset}`
    );
  }
};

/**
 * Read a UTF-8 text file. Throws InputError if it is missing, unreadable
 * or not valid UTF-8.
 */
export const readInputFile = async (path: string): Promise<string> => {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    switch (errorCode(error)) {
      case "ENOENT":
        throw new InputError(`Input file '${path}' does not exist`);
      case "EISDIR":
        throw new InputError(`Input path '${path}' is a directory`);
      case "EACCES":
        throw new InputError(`Permission denied reading '${path}'`);
      default:
        throw new InputError(
          `Cannot read input file '${path}': ${errorMessage(error)}`
        );
    }
  }
  return decodeUtf8(bytes, path);
};

/**
 * Write text to a file as UTF-8, creating missing parent directories.
 * Returns the number of bytes written.
 */
export const writeOutputFile = async (
  path: string,
  content: string
): Promise<number> => {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
  } catch (error) {
    throw new OutputError(
      `Cannot write output file '${path}': ${errorMessage(error)}`
    );
  }
  return Buffer.byteLength(content, "utf-8");
};
