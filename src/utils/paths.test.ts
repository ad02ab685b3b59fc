/**
 * Tests for output layout and naming policy
 */

import { join } from 'path';
import {
  fallbackFileName,
  generateRunId,
  getDestinationPath,
  getFailureReportPath,
  getJobDir,
  getTempPath,
  toSafeSegment,
} from './paths.js';

describe('paths', () => {
  describe('toSafeSegment', () => {
    it('keeps ordinary file names', () => {
      expect(toSafeSegment('report 2024.csv')).toBe('report 2024.csv');
    });

    it('replaces path separators', () => {
      expect(toSafeSegment('a/b\\c')).toBe('a_b_c');
    });

    it('replaces control characters', () => {
      expect(toSafeSegment('a\u0000b\nc')).toBe('a_b_c');
    });

    it('rejects dot segments', () => {
      expect(toSafeSegment('..')).toBe('__');
      expect(toSafeSegment('.')).toBe('_');
    });

    it('trims surrounding whitespace', () => {
      expect(toSafeSegment('  a.csv  ')).toBe('a.csv');
    });
  });

  describe('fallbackFileName', () => {
    it('derives a name from the file id', () => {
      expect(fallbackFileName('98765')).toBe('file_98765');
    });
  });

  describe('destination layout', () => {
    it('places files under <outputDir>/<jobId>/<fileName>', () => {
      expect(getDestinationPath('/out', 'J1', 'a.csv')).toBe(join('/out', 'J1', 'a.csv'));
    });

    it('keeps server-supplied names inside the output directory', () => {
      expect(getJobDir('/out', '../J1')).toBe(join('/out', '.._J1'));
      expect(getDestinationPath('/out', 'J1', '../../etc/passwd')).toBe(
        join('/out', 'J1', '.._.._etc_passwd')
      );
    });

    it('writes in-flight downloads beside the destination', () => {
      expect(getTempPath(join('/out', 'J1', 'a.csv'))).toBe(join('/out', 'J1', 'a.csv.tmp'));
    });

    it('puts failure reports in the logs directory', () => {
      expect(getFailureReportPath('/out', 'run-1')).toBe(
        join('/out', '.diy-export', 'logs', 'download-failures-run-1.json')
      );
    });
  });

  describe('generateRunId', () => {
    it('produces a filesystem-safe timestamp', () => {
      expect(generateRunId(new Date('2024-05-01T10:20:30.456Z'))).toBe('2024-05-01T10-20-30-456Z');
    });
  });
});
