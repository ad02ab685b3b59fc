/**
 * Interactive wizard
 *
 * Walks through token acquisition and tenant discovery, then loops over
 * list / download / export until the user quits. Credentials stay in memory.
 */

import prompts from 'prompts';
import chalk from 'chalk';
import { downloadExportFiles, materializeExport } from '../core/export.js';
import { fetchAppToken } from '../graph/export-api.js';
import { collect } from '../graph/paginator.js';
import type { FetchLike } from '../graph/types.js';
import { parseStatus } from '../config/index.js';
import { ExportToolError } from '../utils/errors.js';
import { renderJobSummary, renderJobsTable } from './render.js';
import { createSession, runAndReport, type Session } from './session.js';

export interface WizardOptions {
  token?: string;
  tenantId?: string;
  output: string;
  apiVersion: string;
  maxRetries: number;
  backoffMs: number;
  fetch?: FetchLike;
}

type WizardAction = 'list' | 'download' | 'export' | 'quit';

const JOB_DETAIL_FIELDS = ['status', 'diy_types', 'total_number_of_completed_jobs'];

async function askText(message: string, initial?: string): Promise<string | undefined> {
  const { value } = await prompts({ type: 'text', name: 'value', message, initial });
  return typeof value === 'string' ? value.trim() : undefined;
}

async function askConfirm(message: string, initial: boolean): Promise<boolean> {
  const { value } = await prompts({ type: 'confirm', name: 'value', message, initial });
  return value === true;
}

/**
 * Secret input; the user decides whether it is masked while typing
 */
async function askSecret(message: string, secretName: string, hideByDefault: boolean): Promise<string | undefined> {
  const hide = await askConfirm(`Hide the ${secretName} while typing/pasting?`, hideByDefault);
  const { value } = await prompts({ type: hide ? 'password' : 'text', name: 'value', message });
  return typeof value === 'string' ? value.trim() : undefined;
}

async function askAction(): Promise<WizardAction> {
  const { value } = await prompts({
    type: 'select',
    name: 'value',
    message: 'What would you like to do next?',
    choices: [
      { title: 'List export jobs', value: 'list' },
      { title: "Download one job's files", value: 'download' },
      { title: 'Export every completed job', value: 'export' },
      { title: 'Quit', value: 'quit' },
    ],
  });
  return value === 'list' || value === 'download' || value === 'export' ? value : 'quit';
}

async function acquireToken(options: WizardOptions, apiVersion: string): Promise<string | undefined> {
  if (options.token) {
    console.log(chalk.gray('Using access token supplied via command line or environment.'));
    return options.token;
  }

  const hasToken = await askConfirm(
    'Do you already have a permanent access token for your custom integration?',
    true
  );
  if (hasToken) {
    return askSecret('Paste your access token', 'access token', false);
  }

  const appId = await askText('Enter your custom integration App ID');
  const appSecret = await askSecret('Enter your App Secret', 'App Secret', true);
  if (!appId || !appSecret) {
    return undefined;
  }

  const token = await fetchAppToken(appId, appSecret, { apiVersion, fetch: options.fetch });
  console.log(chalk.green('Access token retrieved successfully.'));
  return token;
}

async function resolveTenant(options: WizardOptions, session: Session): Promise<string | undefined> {
  if (options.tenantId) {
    console.log(`Using tenant/community ID: ${chalk.bold(options.tenantId)}`);
    return options.tenantId;
  }

  if (await askConfirm('Do you already know your tenant/community ID?', false)) {
    return askText('Enter your tenant/community ID');
  }

  try {
    const tenantId = await session.api.fetchTenantId();
    console.log(`${chalk.green('Discovered tenant/community ID:')} ${chalk.bold(tenantId)}`);
    return tenantId;
  } catch (error) {
    if (!(error instanceof ExportToolError)) throw error;
    console.log(chalk.red(error.message));
    return askText('Please paste your tenant/community ID (find it in Admin Panel URLs)');
  }
}

async function listStep(session: Session, tenantId: string | undefined): Promise<void> {
  const answer = await askText('Filter by status (completed, in_progress, pending, failed, all)', 'completed');
  const status = parseStatus(answer ?? '');
  const jobs = tenantId
    ? await collect(session.api.listJobs(tenantId, status))
    : await collect(session.api.listCommunityJobs(status));
  console.log(renderJobsTable(jobs));
}

async function downloadStep(session: Session, options: WizardOptions): Promise<void> {
  const jobId = await askText('Enter the export job ID you would like to download');
  if (!jobId) {
    console.log(chalk.yellow('No export job ID provided.'));
    return;
  }

  const details = await session.api.fetchJob(jobId, JOB_DETAIL_FIELDS);
  console.log(chalk.bold('Export job summary'));
  for (const line of renderJobSummary(details)) {
    console.log(`  ${line}`);
  }

  const outputDir = (await askText('Where should the files be saved?', options.output)) || options.output;
  const includeUserJobs = await askConfirm('Include the per-user DIY jobs of this export?', true);
  await runAndReport(outputDir, () =>
    downloadExportFiles({
      source: session.api,
      transport: session.transport,
      exportId: jobId,
      details,
      includeUserJobs,
      outputDir,
      maxRetries: options.maxRetries,
      download: { backoffMs: options.backoffMs },
    })
  );
}

async function exportStep(session: Session, options: WizardOptions, tenantId: string | undefined): Promise<void> {
  if (!tenantId) {
    console.log(chalk.yellow('A tenant/community ID is required to export every job.'));
    return;
  }

  const outputDir = (await askText('Where should the files be saved?', options.output)) || options.output;
  await runAndReport(outputDir, () =>
    materializeExport({
      source: session.api,
      transport: session.transport,
      tenantId,
      statusFilter: 'completed',
      outputDir,
      maxRetries: options.maxRetries,
      download: { backoffMs: options.backoffMs },
    })
  );
}

export async function runWizard(options: WizardOptions): Promise<void> {
  console.log(chalk.cyan.bold('Workplace Export Assistant'));
  console.log(
    'This wizard authenticates with the DIY Export API, discovers your tenant/community ID,\n' +
      'lists export jobs and downloads export files.\n'
  );

  const apiVersion = (await askText('Graph API version', options.apiVersion)) || options.apiVersion;

  let token: string | undefined;
  try {
    token = await acquireToken(options, apiVersion);
  } catch (error) {
    if (!(error instanceof ExportToolError)) throw error;
    console.log(chalk.red(error.message));
    return;
  }

  if (!token) {
    console.log(chalk.red('An access token is required to continue.'));
    return;
  }
  console.log(chalk.dim('Credentials are only held in memory for this session; they are never written to disk.'));

  const session = createSession(token, apiVersion, options.fetch);
  const tenantId = await resolveTenant(options, session);
  if (!tenantId) {
    console.log(chalk.yellow('No tenant/community ID stored. Listing uses the /community/work_dyi_jobs endpoint.'));
  }

  for (;;) {
    const action = await askAction();
    if (action === 'quit') {
      console.log('Goodbye!');
      return;
    }

    try {
      if (action === 'list') {
        await listStep(session, tenantId);
      } else if (action === 'download') {
        await downloadStep(session, options);
      } else {
        await exportStep(session, options, tenantId);
      }
    } catch (error) {
      if (!(error instanceof ExportToolError)) throw error;
      console.log(chalk.red(error.message));
    }
  }
}
