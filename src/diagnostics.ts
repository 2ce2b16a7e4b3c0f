import type { DiagnosticEvent, Severity, WarningCategory } from './types.js';

/**
 * Where diagnostics are printed. `log` is stdout, `error` is stderr.
 */
export interface Reporter {
  log(message: string): void;
  error(message: string): void;
}

export interface DiagnosticsOptions {
  /** Print warnings and info as they are recorded */
  verbose?: boolean;
  /** Suppress info and the summary (criticals still print) */
  silent?: boolean;
  reporter?: Reporter;
}

/**
 * Thrown when recording into a collector whose summary has been taken.
 */
export class DiagnosticsClosedError extends Error {
  constructor() {
    super('Diagnostics already finalized; no further events accepted');
    this.name = 'DiagnosticsClosedError';
  }
}

const REPAIR_MARKER = 'Used lenient parsing';

/**
 * Summary bucket for a warning message.
 */
export function classifyWarning(message: string): WarningCategory {
  if (message.includes('frontmatter')) {
    return 'Frontmatter parsing errors';
  } else if (message.includes('Failed to parse')) {
    return 'File parsing errors';
  } else if (message.includes('Failed to read')) {
    return 'File read errors';
  }
  return 'Other errors';
}

function withPath(message: string, path?: string): string {
  return path ? `${message} (${path})` : message;
}

/**
 * Collects per-note events during a scan and renders the final summary.
 *
 * Each record call completes without yielding, so concurrent scan lanes
 * never interleave inside one. `summary()` closes the collector.
 */
export class Diagnostics {
  private readonly verbose: boolean;
  private readonly silent: boolean;
  private readonly reporter: Reporter;
  private readonly entries: DiagnosticEvent[] = [];
  private readonly errorCounts = new Map<WarningCategory, number>();
  private repaired = 0;
  private finalized = false;

  constructor(options: DiagnosticsOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.reporter = options.reporter ?? console;
  }

  get events(): readonly DiagnosticEvent[] {
    return this.entries;
  }

  get repairedCount(): number {
    return this.repaired;
  }

  get categoryCounts(): ReadonlyMap<WarningCategory, number> {
    return this.errorCounts;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  countBySeverity(severity: Severity): number {
    return this.entries.filter(e => e.severity === severity).length;
  }

  critical(message: string, path?: string): void {
    this.ensureOpen();
    // Read errors quote the file path, which may itself say "frontmatter"
    const category = message.startsWith('Failed to read') ? 'File read errors' : classifyWarning(message);
    this.tally(category);
    this.reporter.error(`Error: ${withPath(message, path)}`);
    this.entries.push({ severity: 'critical', message, path, category });
  }

  warning(message: string, path?: string): void {
    this.ensureOpen();
    const event: DiagnosticEvent = { severity: 'warning', message, path };

    if (message.includes(REPAIR_MARKER)) {
      this.repaired++;
    } else {
      event.category = classifyWarning(message);
      this.tally(event.category);
    }

    if (this.verbose) {
      this.reporter.error(`Warning: ${withPath(message, path)}`);
    }
    this.entries.push(event);
  }

  info(message: string, path?: string): void {
    this.ensureOpen();
    if (this.verbose && !this.silent) {
      this.reporter.log(message);
    }
    this.entries.push({ severity: 'info', message, path });
  }

  /**
   * Close the collector and report the outcome of the scan.
   * Returns the summary lines (also printed unless silent).
   */
  summary(totalCandidates: number, succeeded: number): string[] {
    this.ensureOpen();
    this.finalized = true;

    const lines = [`Successfully parsed ${succeeded} of ${totalCandidates} notes`];

    if (this.repaired > 0) {
      lines.push(`Fixed ${this.repaired} files with lenient parsing (frontmatter with colons in values)`);
    }

    const totalErrors = Array.from(this.errorCounts.values()).reduce((a, b) => a + b, 0);
    if (totalErrors > 0) {
      lines.push(`Errors in ${totalErrors} files:`);
      for (const [category, count] of this.errorCounts) {
        lines.push(`  - ${category}: ${count} files`);
      }
      if (!this.verbose) {
        lines.push('Use --verbose/-v to see detailed error messages');
      }
    }

    if (!this.silent) {
      lines.forEach(line => this.reporter.log(line));
    }
    return lines;
  }

  private tally(category: WarningCategory): void {
    this.errorCounts.set(category, (this.errorCounts.get(category) ?? 0) + 1);
  }

  private ensureOpen(): void {
    if (this.finalized) {
      throw new DiagnosticsClosedError();
    }
  }
}
