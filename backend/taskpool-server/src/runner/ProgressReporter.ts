/**
 * ProgressReporter
 *
 * Text progress renderer for a TaskScheduler. Pass `reporter.observer` as the
 * scheduler's `onProgress`; every update is written as one line:
 *
 *   copy-assets [#####.....] 5/10
 *
 * Repeated updates that would render the same line are skipped.
 */

import type { ProgressObserver } from "../queue/TaskRecord";

/**
 * Anything with a string write(), e.g. process.stdout or a file stream
 */
export interface ProgressOutput {
  write(chunk: string): unknown;
}

export interface ProgressReporterOptions {
  /** Where lines are written (default: process.stdout) */
  output?: ProgressOutput;
  /** Characters in the bar (default: 10) */
  width?: number;
  /** Filled bar character (default: '#') */
  fill?: string;
  /** Empty bar character (default: '.') */
  empty?: string;
}

export interface ProgressLine {
  name: string;
  completed: number;
  total: number;
}

export class ProgressReporter {
  private readonly output: ProgressOutput;
  private readonly width: number;
  private readonly fill: string;
  private readonly empty: string;
  /** Last rendered line per task */
  private readonly lastLines: Map<string, string> = new Map();
  private readonly latest: Map<string, ProgressLine> = new Map();

  constructor(options: ProgressReporterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.width = Math.max(1, Math.floor(options.width ?? 10));
    this.fill = options.fill ?? "#";
    this.empty = options.empty ?? ".";
  }

  /**
   * Scheduler observer bound to this reporter.
   */
  readonly observer: ProgressObserver = (name, completed, total) => {
    this.update(name, completed, total);
  };

  update(name: string, completed: number, total: number): void {
    this.latest.set(name, { name, completed, total });
    const line = this.render(name, completed, total);
    if (this.lastLines.get(name) === line) {
      return;
    }
    this.lastLines.set(name, line);
    this.output.write(`${line}\n`);
  }

  render(name: string, completed: number, total: number): string {
    const ratio = total > 0 ? Math.min(Math.max(completed / total, 0), 1) : 0;
    const filled = Math.round(ratio * this.width);
    const bar = this.fill.repeat(filled) + this.empty.repeat(this.width - filled);
    return `${name} [${bar}] ${completed}/${total}`;
  }

  /**
   * Latest progress seen for each task, in first-seen order
   */
  snapshot(): ProgressLine[] {
    return Array.from(this.latest.values());
  }

  /**
   * Forget a task, e.g. after it was removed from the scheduler
   */
  forget(name: string): void {
    this.lastLines.delete(name);
    this.latest.delete(name);
  }
}
