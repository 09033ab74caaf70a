/**
 * SafeFileWriter
 *
 * Append-only file sink shared by concurrently running tasks. Writes are
 * serialized through a promise chain, so lines from different tasks never
 * interleave and land in the order write() was called.
 *
 * Design Notes:
 * - Each write appends the data plus a trailing newline
 * - ANSI escape codes are stripped unless `stripAnsi: false`
 * - A failed write rejects its own caller with FileSinkError; later writes
 *   still run
 */

import * as fs from "fs";
import * as path from "path";
import stripAnsi from "strip-ansi";
import { FileSinkError, toError } from "../queue/errors";

export interface SafeFileWriterOptions {
  /** Remove ANSI escape codes before writing (default: true) */
  stripAnsi?: boolean;
  /** Create the parent directory on first write (default: false) */
  createDirectory?: boolean;
}

export class SafeFileWriter {
  readonly filePath: string;

  private readonly stripAnsi: boolean;
  private readonly createDirectory: boolean;
  /** Tail of the write chain; never rejects */
  private tail: Promise<void> = Promise.resolve();
  private directoryReady: boolean = false;
  private linesWritten: number = 0;

  constructor(filePath: string, options: SafeFileWriterOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.stripAnsi = options.stripAnsi ?? true;
    this.createDirectory = options.createDirectory ?? false;
  }

  /**
   * Append one line.
   *
   * @throws FileSinkError if the file cannot be written
   */
  write(data: string): Promise<void> {
    return this.enqueue([data]);
  }

  /**
   * Append several lines as one uninterrupted block.
   */
  writeLines(lines: readonly string[]): Promise<void> {
    return this.enqueue(lines);
  }

  /**
   * Resolves once every write issued so far has finished.
   */
  flush(): Promise<void> {
    return this.tail;
  }

  /**
   * Number of lines successfully appended by this writer
   */
  getLineCount(): number {
    return this.linesWritten;
  }

  private enqueue(lines: readonly string[]): Promise<void> {
    const pending = this.tail.then(() => this.append(lines));
    // The caller observes a failure through `pending`; the chain itself moves on
    this.tail = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  private async append(lines: readonly string[]): Promise<void> {
    const text = lines.map((line) => `${this.stripAnsi ? stripAnsi(line) : line}\n`).join("");
    try {
      if (this.createDirectory && !this.directoryReady) {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        this.directoryReady = true;
      }
      await fs.promises.appendFile(this.filePath, text, "utf-8");
      this.linesWritten += lines.length;
    } catch (err) {
      throw new FileSinkError(this.filePath, toError(err));
    }
  }
}
