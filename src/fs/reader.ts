/**
 * Whole-file reads into one shared buffer, accepted only when valid UTF-8.
 *
 * The buffer is reused for every file and only grows, so a run allocates
 * roughly once per size doubling of the largest file seen.
 */

import { isUtf8 } from "node:buffer";
import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { FileReadError, InvalidEncodingError } from "../errors.js";
import { READ_CONFIG } from "../config.js";

export type ReadResult =
  | { ok: true; text: string; bytes: number }
  | { ok: false; error: FileReadError | InvalidEncodingError };

export class FileReader {
  private buffer: Buffer;

  constructor(initialSize: number = READ_CONFIG.INITIAL_BUFFER_SIZE) {
    this.buffer = Buffer.allocUnsafe(Math.max(1, initialSize));
  }

  /** Current size of the shared buffer in bytes. */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Read and decode `path`. Never throws for problems with the file itself.
   */
  read(path: string): ReadResult {
    let fd: number;
    try {
      fd = openSync(path, "r");
    } catch (err) {
      return { ok: false, error: new FileReadError(path, "open", err) };
    }

    let length = 0;
    let failed = false;
    let failure: unknown;
    try {
      length = this.fill(fd);
    } catch (err) {
      failed = true;
      failure = err;
    }
    try {
      closeSync(fd);
    } catch (err) {
      if (!failed) {
        failed = true;
        failure = err;
      }
    }
    if (failed) {
      return { ok: false, error: new FileReadError(path, "read", failure) };
    }

    const contents = this.buffer.subarray(0, length);
    if (!isUtf8(contents)) {
      return { ok: false, error: new InvalidEncodingError(path) };
    }
    let text: string;
    try {
      text = contents.toString("utf8");
    } catch (err) {
      // ERR_STRING_TOO_LONG past buffer.constants.MAX_STRING_LENGTH
      return { ok: false, error: new FileReadError(path, "read", err) };
    }
    return { ok: true, text, bytes: length };
  }

  /** Read `fd` to EOF into the shared buffer, returning the byte count. */
  private fill(fd: number): number {
    // one spare byte lets the first read after the reported size hit EOF without growing
    const expected = fstatSync(fd).size + 1;
    if (expected > this.buffer.length) {
      this.grow(expected, 0);
    }

    let length = 0;
    for (;;) {
      if (length === this.buffer.length) {
        this.grow(this.buffer.length * 2, length);
      }
      const n = readSync(fd, this.buffer, length, this.buffer.length - length, null);
      if (n === 0) return length;
      length += n;
    }
  }

  private grow(size: number, keep: number): void {
    const next = Buffer.allocUnsafe(size);
    this.buffer.copy(next, 0, 0, keep);
    this.buffer = next;
  }
}
