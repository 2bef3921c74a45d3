import fs from "fs/promises";
import path from "path";
import { describeError, ioFailure } from "./errors";
import { appendLine } from "./filesystem";
import { formatTimestamp } from "./history";
import type { DiagnosticEvent } from "./types";

export interface DiagnosticsSink {
  record(event: DiagnosticEvent): Promise<void>;
}

export const silentDiagnostics: DiagnosticsSink = {
  record: async () => undefined
};

export function formatDiagnostic(event: DiagnosticEvent, date: Date): string {
  const profile = event.profile ? ` [${event.profile}]` : "";
  return `[${formatTimestamp(date)}] ${event.level.toUpperCase()} ${event.action}${profile}: ${event.message}`;
}

export interface FileDiagnosticsOptions {
  /** Mirror every line to stderr. */
  echo?: boolean;
  now?: () => Date;
}

export class FileDiagnostics implements DiagnosticsSink {
  private readonly logPath: string;
  private readonly echo: boolean;
  private readonly now: () => Date;

  constructor(logPath: string, options: FileDiagnosticsOptions = {}) {
    this.logPath = logPath;
    this.echo = options.echo ?? false;
    this.now = options.now ?? (() => new Date());
  }

  async record(event: DiagnosticEvent): Promise<void> {
    const line = formatDiagnostic(event, this.now());
    if (this.echo) {
      console.error(line);
    }
    try {
      await fs.mkdir(path.dirname(this.logPath), { recursive: true });
      await appendLine(this.logPath, line);
    } catch (error) {
      throw ioFailure(`Failed to write ${this.logPath}`, error);
    }
  }
}

/**
 * Records `event` without letting a sink failure replace the error being
 * reported; the failure goes to `report` instead.
 */
export async function recordAlongside(
  sink: DiagnosticsSink,
  event: DiagnosticEvent,
  report: (message: string) => void
): Promise<void> {
  try {
    await sink.record(event);
  } catch (error) {
    report(`Failed to record diagnostics: ${describeError(error)}`);
  }
}
