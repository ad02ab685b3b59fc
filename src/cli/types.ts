/**
 * CLI option shapes as produced by commander
 */

import type { ExportJobStatus } from '../graph/types.js';

export interface GlobalOptions {
  token?: string;
  apiVersion: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface ListOptions {
  status?: ExportJobStatus;
}

export interface DownloadCommandOptions {
  output: string;
  maxRetries: number;
  /** false with --no-user-jobs */
  userJobs: boolean;
}

export interface ExportCommandOptions {
  tenantId?: string;
  outputDir: string;
  status?: ExportJobStatus;
  startDate?: string;
  endDate?: string;
  maxRetries: number;
}

export interface WizardCommandOptions {
  tenantId?: string;
  output: string;
}

export interface CommandHandlers {
  community(globals: GlobalOptions): Promise<void>;
  list(globals: GlobalOptions, tenantId: string | undefined, options: ListOptions): Promise<void>;
  download(globals: GlobalOptions, jobId: string, options: DownloadCommandOptions): Promise<void>;
  export(globals: GlobalOptions, options: ExportCommandOptions): Promise<void>;
  wizard(globals: GlobalOptions, options: WizardCommandOptions): Promise<void>;
}
