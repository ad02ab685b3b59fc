/**
 * Tests for failure report writer
 * Verifies JSON report creation, structure, and manual recovery guidance
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { summarizeJobs } from '../core/export.js';
import { getLogger, resetLogger } from '../utils/logger.js';
import {
  collectFailures,
  generateManualRecovery,
  toFailureSummary,
  writeFailureReport,
  type FailureReport,
  type FailureSummary,
} from './failure-report.js';

const SUMMARY: FailureSummary = {
  tenantId: 'T1',
  jobsCompleted: 1,
  jobsSkipped: 0,
  jobsFailed: 0,
  succeeded: 1,
  skipped: 0,
  failed: 1,
};

describe('failure-report', () => {
  let testDir: string;

  beforeEach(async () => {
    resetLogger();
    getLogger({ quiet: true });
    testDir = await mkdtemp(join(tmpdir(), 'diy-report-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('writeFailureReport', () => {
    it('writes the report under the logs directory', async () => {
      const reportPath = await writeFailureReport(testDir, 'run-123', SUMMARY, []);

      expect(reportPath).toBe(join(testDir, '.diy-export', 'logs', 'download-failures-run-123.json'));
    });

    it('serializes run id, summary and failures', async () => {
      const failures = [
        {
          jobId: 'J1',
          fileName: 'b.csv',
          url: 'https://files.test/b.csv',
          destinationPath: join(testDir, 'J1', 'b.csv'),
          attempts: 4,
          errorMessage: 'Checksum mismatch',
          timestamp: '2024-05-01T00:00:00.000Z',
          manualRecovery: ['Re-run the export; files already on disk are skipped'],
        },
      ];

      const reportPath = await writeFailureReport(testDir, 'run-1', SUMMARY, failures);
      if (reportPath === null) throw new Error('report was not written');

      const report: FailureReport = JSON.parse(await readFile(reportPath, 'utf-8'));
      expect(report.runId).toBe('run-1');
      expect(report.summary).toEqual(SUMMARY);
      expect(report.failures).toEqual(failures);
    });

    it('returns null when the directory cannot be created', async () => {
      const blocker = join(testDir, 'blocker');
      await writeFile(blocker, 'not a directory');

      expect(await writeFailureReport(blocker, 'run-1', SUMMARY, [])).toBeNull();
    });
  });

  describe('generateManualRecovery', () => {
    it('points at the download URL for file failures', () => {
      expect(
        generateManualRecovery({
          jobId: 'J1',
          fileName: 'a.csv',
          url: 'https://files.test/a.csv',
          attempts: 4,
          errorMessage: 'HTTP 500',
          timestamp: '2024-05-01T00:00:00.000Z',
        })
      ).toEqual([
        'Download URL (may expire): https://files.test/a.csv',
        'Re-run the export; files already on disk are skipped',
      ]);
    });

    it('suggests listing again for job failures', () => {
      expect(
        generateManualRecovery({
          jobId: 'J2',
          fileName: '',
          attempts: 0,
          errorMessage: 'Server down',
          timestamp: '2024-05-01T00:00:00.000Z',
        })
      ).toEqual([
        'List the files of export J2 again once the API error is resolved',
        'Re-run the export; files already on disk are skipped',
      ]);
    });
  });

  describe('collectFailures', () => {
    it('collects failed files and failed job listings', () => {
      const summary = summarizeJobs(
        'T1',
        [
          {
            jobId: 'J1',
            status: 'finished',
            files: [
              { status: 'skipped', jobId: 'J1', fileName: 'x.csv', reason: 'missing-url' },
              {
                status: 'failed',
                jobId: 'J1',
                fileName: 'b.csv',
                url: 'https://files.test/b.csv',
                destinationPath: '/out/J1/b.csv',
                attempts: 4,
                error: new Error('bad bytes'),
              },
            ],
          },
          { jobId: 'J2', status: 'failed', files: [], error: new Error('Server down') },
        ],
        []
      );

      const failures = collectFailures(summary, new Date('2024-05-01T00:00:00.000Z'));

      expect(failures).toEqual([
        {
          jobId: 'J1',
          fileName: 'b.csv',
          url: 'https://files.test/b.csv',
          destinationPath: '/out/J1/b.csv',
          attempts: 4,
          errorMessage: 'bad bytes',
          timestamp: '2024-05-01T00:00:00.000Z',
          manualRecovery: [
            'Download URL (may expire): https://files.test/b.csv',
            'Re-run the export; files already on disk are skipped',
          ],
        },
        {
          jobId: 'J2',
          fileName: '',
          attempts: 0,
          errorMessage: 'Server down',
          timestamp: '2024-05-01T00:00:00.000Z',
          manualRecovery: [
            'List the files of export J2 again once the API error is resolved',
            'Re-run the export; files already on disk are skipped',
          ],
        },
      ]);
      expect(toFailureSummary(summary)).toEqual({
        tenantId: 'T1',
        jobsCompleted: 1,
        jobsSkipped: 0,
        jobsFailed: 1,
        succeeded: 0,
        skipped: 1,
        failed: 1,
      });
    });
  });
});
