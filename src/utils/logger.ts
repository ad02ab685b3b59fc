/**
 * Logger utility with verbose and quiet modes
 * - info(): prints unless quiet
 * - debug(): only prints with --verbose
 * - summary(): final export statistics
 */

export interface LoggerConfig {
  verbose?: boolean;
  quiet?: boolean;
}

export interface SummaryStats {
  jobs?: {
    completed: number;
    skipped: number;
    failed: number;
  };
  files?: {
    succeeded: number;
    skipped: number;
    failed: number;
  };
}

class Logger {
  private verbose: boolean;
  private quiet: boolean;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
    this.quiet = config?.quiet ?? false;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  isVerbose(): boolean {
    return this.verbose && !this.quiet;
  }

  /**
   * Concise progress lines; suppressed by --quiet
   */
  info(message: string): void {
    if (!this.quiet) {
      console.log(`[diy-export] ${message}`);
    }
  }

  /**
   * Request-level detail, backoff/retry notes
   */
  debug(message: string): void {
    if (this.isVerbose()) {
      console.log(`[diy-export] DEBUG: ${message}`);
    }
  }

  summary(stats: SummaryStats): void {
    if (stats.jobs) {
      const { completed, skipped, failed } = stats.jobs;
      this.info(`Jobs: ${completed} completed, ${skipped} skipped, ${failed} failed`);
    }

    if (stats.files) {
      const { succeeded, skipped, failed } = stats.files;
      this.info(`Files: ${succeeded} downloaded, ${skipped} skipped, ${failed} failed`);
    }
  }

  phaseComplete(phaseName: string, details?: string): void {
    this.info(details ? `${phaseName} complete: ${details}` : `${phaseName} complete`);
  }

  phaseStart(phaseName: string): void {
    this.debug(`Starting phase: ${phaseName}`);
  }

  /**
   * Warnings and errors are never silenced
   */
  warn(message: string): void {
    console.warn(`[diy-export] WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`[diy-export] ERROR: ${message}`);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton.
 * A config passed after creation is applied to the existing instance.
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config) {
    if (config.verbose !== undefined) loggerInstance.setVerbose(config.verbose);
    if (config.quiet !== undefined) loggerInstance.setQuiet(config.quiet);
  }
  return loggerInstance;
}

export function resetLogger(): void {
  loggerInstance = null;
}

export { Logger };
