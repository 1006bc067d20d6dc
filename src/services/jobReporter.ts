export enum LogLevel {
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR"
}

export enum RunStatus {
  COMPLETED = "completed",
  COMPLETED_WITH_ERRORS = "completed_with_errors",
  FAILED = "failed"
}

export interface RunCounts {
  discovered: number;
  processed: number;
  skipped: number;
  failed: number;
}

export interface JobReporterOptions {
  /** Suppress INFO lines and the final table; warnings and errors still reach stderr */
  quiet?: boolean;
  clock?: () => Date;
}

export type RunLogger = Pick<JobReporter, "info" | "warn" | "error">;

const icons = {
  [LogLevel.INFO]: "ℹ️",
  [LogLevel.WARN]: "⚠️",
  [LogLevel.ERROR]: "❌"
};

export class JobReporter {
  private counts: RunCounts = {
    discovered: 0,
    processed: 0,
    skipped: 0,
    failed: 0
  };
  private startedAt: Date | null = null;
  private quiet: boolean;
  private clock: () => Date;

  constructor(
    private jobName: string,
    options: JobReporterOptions = {}
  ) {
    this.quiet = options.quiet ?? false;
    this.clock = options.clock ?? (() => new Date());
  }

  startRun(): void {
    this.startedAt = this.clock();
    this.log(LogLevel.INFO, `Job started: ${this.jobName}`);
  }

  /**
   * Writes a timestamped, icon-prefixed line. INFO goes to stdout,
   * WARN and ERROR to stderr.
   */
  log(level: LogLevel, message: string): void {
    if (this.quiet && level === LogLevel.INFO) return;

    const timestamp = this.clock().toLocaleTimeString();
    const line = `[${timestamp}] ${icons[level]} ${message}`;

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.log(LogLevel.WARN, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  incrementDiscovered(count: number = 1): void {
    this.counts.discovered += count;
  }

  incrementProcessed(): void {
    this.counts.processed++;
  }

  incrementSkipped(): void {
    this.counts.skipped++;
  }

  incrementFailed(): void {
    this.counts.failed++;
  }

  /**
   * Concludes the run and prints the summary table.
   * @param error Set when the job terminated due to an exception
   * @returns The final run status
   */
  finishRun(error?: Error): RunStatus {
    let status = RunStatus.COMPLETED;

    if (error) {
      status = RunStatus.FAILED;
      this.error(`Fatal crash: ${error.message}`);
    } else if (this.counts.failed > 0) {
      status = RunStatus.COMPLETED_WITH_ERRORS;
    }

    if (!this.quiet) this.printFinalSummary(status);
    return status;
  }

  private printFinalSummary(status: RunStatus): void {
    const seconds = this.startedAt
      ? Math.round((this.clock().getTime() - this.startedAt.getTime()) / 1000)
      : 0;

    console.log(`\n${"=".repeat(40)}`);
    console.log(`JOB FINISHED: ${this.jobName}`);
    console.log(`${"=".repeat(40)}`);

    console.table([
      {
        Status: status,
        Found: this.counts.discovered,
        Success: this.counts.processed,
        Skipped: this.counts.skipped,
        Failed: this.counts.failed,
        Duration: formatDuration(seconds)
      }
    ]);
    console.log(`${"=".repeat(40)}\n`);
  }
}

export function formatDuration(totalSeconds: number): string {
  const mins = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
}
