import { FailureType } from "../errors";

export enum LogLevel {
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR"
}

export interface CaseFailure {
  caseName: string;
  type: FailureType;
  message: string;
}

export interface RunSummary {
  year: string;
  status: "completed" | "completed_with_errors" | "failed";
  discovered: number;
  skippedRows: number;
  succeeded: number;
  failed: number;
  failures: CaseFailure[];
  durationMs: number;
  errorSummary: string | null;
}

export class JobReporter {
  private startedAt = Date.now();
  private counts = { discovered: 0, skippedRows: 0, succeeded: 0, failed: 0 };
  private failures: CaseFailure[] = [];

  constructor(private year: string) {}

  /**
   * Resets the counters and marks the start of a run.
   * @param destination Directory the run writes into, echoed in the first log line
   */
  startRun(destination: string): void {
    this.startedAt = Date.now();
    this.counts = { discovered: 0, skippedRows: 0, succeeded: 0, failed: 0 };
    this.failures = [];
    this.log(
      LogLevel.INFO,
      `Processing Year ${this.year} → saving audio to ${destination}`
    );
  }

  /**
   * Prints a timestamped log line with a level icon.
   * @param level The severity level using the LogLevel enum (INFO, WARN, ERROR)
   * @param message The descriptive text to be recorded
   */
  log(level: LogLevel, message: string): void {
    const timestamp = new Date().toLocaleTimeString();

    const icons = {
      [LogLevel.INFO]: "ℹ️",
      [LogLevel.WARN]: "⚠️",
      [LogLevel.ERROR]: "❌"
    };
    const line = `[${timestamp}] ${icons[level]} ${message}`;

    if (level === LogLevel.ERROR) console.error(line);
    else console.log(line);
  }

  /**
   * Records the outcome of the listing phase.
   * @param found Listings handed to the resolver
   * @param skippedRows Table rows dropped by the extractor
   */
  recordListing(found: number, skippedRows: number): void {
    this.counts.discovered += found;
    this.counts.skippedRows += skippedRows;
  }

  recordSuccess(): void {
    this.counts.succeeded++;
  }

  /**
   * Records a per-case failure and prints a one-line message naming the case
   * and the failure type.
   */
  recordFailure(caseName: string, type: FailureType, message: string): void {
    this.counts.failed++;
    this.failures.push({ caseName, type, message });
    this.log(LogLevel.ERROR, `${type} for ${caseName}: ${message}`);
  }

  /**
   * Concludes the run, derives its status and prints the summary table.
   * @param error Optional Error object if the run terminated due to an exception
   */
  finishRun(error?: Error): RunSummary {
    let status: RunSummary["status"] = "completed";
    let errorSummary: string | null = null;

    if (error) {
      status = "failed";
      errorSummary = error.message;
      this.log(LogLevel.ERROR, `Fatal crash: ${error.message}`);
    } else if (this.counts.failed > 0) {
      status = "completed_with_errors";
    }

    const summary: RunSummary = {
      year: this.year,
      status,
      ...this.counts,
      failures: [...this.failures],
      durationMs: Date.now() - this.startedAt,
      errorSummary
    };

    this.printFinalSummary(summary);
    return summary;
  }

  private printFinalSummary(summary: RunSummary): void {
    console.log(`\n${"=".repeat(40)}`);
    console.log(`RUN FINISHED: ${summary.year}`);
    console.log(`${"=".repeat(40)}`);

    console.table([
      {
        Status: summary.status,
        Found: summary.discovered,
        "Skipped Rows": summary.skippedRows,
        Success: summary.succeeded,
        Failed: summary.failed,
        Duration: this.formatDuration(summary.durationMs)
      }
    ]);

    if (summary.failures.length > 0) {
      console.table(
        summary.failures.map((f) => ({
          Case:
            f.caseName.length > 50
              ? f.caseName.substring(0, 47) + "..."
              : f.caseName,
          Type: f.type,
          Error: f.message.split("\n")[0] // Only show the first line of the error
        }))
      );
    }

    if (summary.errorSummary) {
      console.log(`\n❌ Error Detail: ${summary.errorSummary}`);
    }
    console.log(`${"=".repeat(40)}\n`);
  }

  private formatDuration(ms: number): string {
    const totalSecs = Math.round(ms / 1000);
    const mins = Math.floor(totalSecs / 60);
    const secs = totalSecs % 60;
    return mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
  }
}
