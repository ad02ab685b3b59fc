import { Command } from 'commander';
import { parseRetries, parseStatus, resolveConfig, type ExportConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import type {
  CommandHandlers,
  DownloadCommandOptions,
  ExportCommandOptions,
  GlobalOptions,
  ListOptions,
  WizardCommandOptions,
} from './types.js';

/**
 * Build the diy-export command tree.
 * Defaults come from config (environment); flags override them.
 */
export function createProgram(handlers: CommandHandlers, config: ExportConfig = resolveConfig()): Command {
  const program = new Command();

  program
    .name('diy-export')
    .description('Workplace DIY Export helper: list export jobs and download their files')
    .version('0.1.0')
    .option('--token <token>', 'Access token (default: WORKPLACE_ACCESS_TOKEN env)', config.accessToken)
    .option('--api-version <version>', 'Graph API version', config.apiVersion)
    .option('--verbose', 'Enable verbose logging', config.verbose)
    .option('--quiet', 'Suppress progress output');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program.hook('preAction', () => {
    const { verbose, quiet } = globals();
    getLogger({ verbose: verbose ?? false, quiet: quiet ?? false });
  });

  program
    .command('community')
    .description('Print the tenant/community ID')
    .action(async () => {
      await handlers.community(globals());
    });

  program
    .command('list')
    .description('List export jobs (uses /community/work_dyi_jobs when no tenant ID is given)')
    .argument('[tenantId]', 'Tenant/community ID', config.tenantId)
    .option('--status <status>', 'Filter by status (pending, in_progress, completed, failed, all)', parseStatus)
    .action(async (tenantId: string | undefined, options: ListOptions) => {
      await handlers.list(globals(), tenantId, options);
    });

  program
    .command('download')
    .description("Download the files of an export's company job and user jobs")
    .argument('<jobId>', 'Export job ID')
    .option('--output <dir>', 'Destination directory', config.outputDir)
    .option('--max-retries <n>', 'Retries per file', parseRetries, config.maxRetries)
    .option('--no-user-jobs', 'Skip the per-user DIY jobs of the export')
    .action(async (jobId: string, options: DownloadCommandOptions) => {
      await handlers.download(globals(), jobId, options);
    });

  program
    .command('export')
    .description('Download every completed export job of a tenant')
    .option('--tenant-id <id>', 'Tenant/community ID (discovered when omitted)', config.tenantId)
    .option('--output-dir <dir>', 'Directory where export files are stored', config.outputDir)
    .option('--status <status>', 'Server-side status filter', parseStatus, 'completed')
    .option('--start-date <iso>', 'Only exports created after this ISO-8601 timestamp')
    .option('--end-date <iso>', 'Only exports created before this ISO-8601 timestamp')
    .option('--max-retries <n>', 'Retries per file', parseRetries, config.maxRetries)
    .action(async (options: ExportCommandOptions) => {
      await handlers.export(globals(), options);
    });

  program
    .command('wizard')
    .description('Launch the interactive setup wizard')
    .option('--tenant-id <id>', 'Pre-populate the tenant/community ID', config.tenantId)
    .option('--output <dir>', 'Default download directory', config.outputDir)
    .action(async (options: WizardCommandOptions) => {
      await handlers.wizard(globals(), options);
    });

  return program;
}
