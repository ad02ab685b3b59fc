/**
 * Command handlers: wire validated CLI options into the export pipeline
 */

import type { ExportConfig } from '../config/index.js';
import { downloadExportFiles, materializeExport } from '../core/export.js';
import { collect } from '../graph/paginator.js';
import type { FetchLike } from '../graph/types.js';
import { InvalidInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { formatJobLine } from './render.js';
import { createSession, runAndReport } from './session.js';
import type { CommandHandlers, GlobalOptions } from './types.js';
import { runWizard } from './wizard.js';

export interface CommandContext {
  fetch?: FetchLike;
  /** Where command results (not log lines) are written */
  out?: (line: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

function requireToken(globals: GlobalOptions): string {
  if (!globals.token) {
    throw InvalidInputError.fromMissingToken();
  }
  return globals.token;
}

export function createHandlers(config: ExportConfig, context: CommandContext = {}): CommandHandlers {
  const out = context.out ?? ((line: string) => console.log(line));
  const download = { backoffMs: config.backoffMs, sleep: context.sleep };

  return {
    async community(globals) {
      const { api } = createSession(requireToken(globals), globals.apiVersion, context.fetch);
      out(await api.fetchTenantId());
    },

    async list(globals, tenantId, options) {
      const { api } = createSession(requireToken(globals), globals.apiVersion, context.fetch);
      const jobs = tenantId
        ? await collect(api.listJobs(tenantId, options.status))
        : await collect(api.listCommunityJobs(options.status));
      for (const job of jobs) {
        out(formatJobLine(job));
      }
    },

    async download(globals, jobId, options) {
      const { api, transport } = createSession(requireToken(globals), globals.apiVersion, context.fetch);
      getLogger().phaseStart('Download');
      await runAndReport(options.output, () =>
        downloadExportFiles({
          source: api,
          transport,
          exportId: jobId,
          outputDir: options.output,
          maxRetries: options.maxRetries,
          includeUserJobs: options.userJobs,
          download,
        })
      );
    },

    async export(globals, options) {
      const { api, transport } = createSession(requireToken(globals), globals.apiVersion, context.fetch);
      const tenantId = options.tenantId ?? (await api.fetchTenantId());
      const logger = getLogger();
      logger.info(`Exporting tenant ${tenantId} to ${options.outputDir}`);
      logger.phaseStart('Download');

      await runAndReport(options.outputDir, () =>
        materializeExport({
          source: api,
          transport,
          tenantId,
          statusFilter: options.status,
          window: { startTime: options.startDate, endTime: options.endDate },
          outputDir: options.outputDir,
          maxRetries: options.maxRetries,
          download,
        })
      );
    },

    async wizard(globals, options) {
      await runWizard({
        token: globals.token,
        tenantId: options.tenantId,
        output: options.output,
        apiVersion: globals.apiVersion,
        maxRetries: config.maxRetries,
        backoffMs: config.backoffMs,
        fetch: context.fetch,
      });
    },
  };
}
