import { describe, it, expect } from '@jest/globals';
import { ProtocolError } from '../utils/errors.js';
import { normalizeStatus, parseExportJob, parseExportJobDetails, parseFileRecord } from './parse.js';

describe('parseExportJob', () => {
  it('normalizes an explicit status', () => {
    expect(parseExportJob({ id: 'J1', status: 'COMPLETED', created_time: '2024-01-01T00:00:00+0000' })).toEqual({
      id: 'J1',
      status: 'completed',
      createdTime: '2024-01-01T00:00:00+0000',
      completed: true,
    });
  });

  it('derives the status from is_completed', () => {
    expect(parseExportJob({ id: 42, is_completed: false })).toEqual({
      id: '42',
      status: 'in_progress',
      createdTime: null,
      completed: false,
    });
    expect(parseExportJob({ id: 'J2', is_completed: true }).status).toBe('completed');
  });

  it('maps status aliases', () => {
    expect(parseExportJob({ id: 'J3', status: 'RUNNING' }).status).toBe('in_progress');
    expect(parseExportJob({ id: 'J4', status: 'error' }).status).toBe('failed');
  });

  it('defaults to pending when nothing says otherwise', () => {
    expect(parseExportJob({ id: 'J5', status: 'queued-somewhere' })).toEqual({
      id: 'J5',
      status: 'pending',
      createdTime: null,
      completed: false,
    });
  });

  it('prefers is_completed for the completed flag', () => {
    expect(parseExportJob({ id: 'J6', status: 'completed', is_completed: false }).completed).toBe(false);
  });

  it('rejects records without an id', () => {
    expect(() => parseExportJob({ status: 'completed' })).toThrow(ProtocolError);
    expect(() => parseExportJob({ status: 'completed' })).toThrow('Response export job is missing required field "id"');
  });

  it('rejects non-object records', () => {
    expect(() => parseExportJob('J1')).toThrow(ProtocolError);
  });
});

describe('parseFileRecord', () => {
  it('reads the file fields', () => {
    expect(
      parseFileRecord({ id: 'F1', file_name: 'a.csv', download_url: 'https://files.test/a.csv', checksum: 'ABC' })
    ).toEqual({
      id: 'F1',
      fileName: 'a.csv',
      downloadUrl: 'https://files.test/a.csv',
      checksum: 'ABC',
      checksumAlgorithm: 'sha256',
    });
  });

  it('synthesizes a name when file_name is missing', () => {
    expect(parseFileRecord({ id: 'F2' }).fileName).toBe('file_F2');
    expect(parseFileRecord({ id: 'F3', file_name: '   ' }).fileName).toBe('file_F3');
  });

  it('sanitizes path separators in file names', () => {
    expect(parseFileRecord({ id: 'F4', file_name: '../evil.sh' }).fileName).toBe('.._evil.sh');
  });

  it('accepts a record without an id', () => {
    expect(parseFileRecord({ file_name: 'noid.csv', download_url: 'https://files.test/noid.csv' })).toEqual({
      id: null,
      fileName: 'noid.csv',
      downloadUrl: 'https://files.test/noid.csv',
      checksum: null,
      checksumAlgorithm: 'sha256',
    });
  });

  it('leaves the name null when neither file_name nor id is present', () => {
    expect(parseFileRecord({ download_url: 'https://files.test/x' }).fileName).toBeNull();
    expect(parseFileRecord('not a record').fileName).toBeNull();
  });

  it('keeps a missing download url as null', () => {
    const record = parseFileRecord({ id: 'F5', file_name: 'b.csv' });
    expect(record.downloadUrl).toBeNull();
    expect(record.checksum).toBeNull();
  });

  it('accepts the sha256 field as the checksum', () => {
    expect(parseFileRecord({ id: 'F6', sha256: 'deadbeef' }).checksum).toBe('deadbeef');
  });

  it('lowercases the checksum algorithm', () => {
    expect(parseFileRecord({ id: 'F7', checksum: 'x', checksum_algorithm: 'MD5' }).checksumAlgorithm).toBe('md5');
  });
});

describe('parseExportJobDetails', () => {
  it('reads the optional detail fields', () => {
    const details = parseExportJobDetails({
      id: 'J1',
      is_completed: true,
      diy_types: ['COMPANY', 3, 'GROUPS'],
      total_number_of_completed_jobs: 2,
      company_job: { id: 'CJ1' },
    });

    expect(details).toEqual({
      job: { id: 'J1', status: 'completed', createdTime: null, completed: true },
      diyTypes: ['COMPANY', 'GROUPS'],
      completedSubJobs: 2,
      companyJobId: 'CJ1',
    });
  });

  it('leaves absent details empty', () => {
    const details = parseExportJobDetails({ id: 'J2' });

    expect(details.diyTypes).toEqual([]);
    expect(details.completedSubJobs).toBeNull();
    expect(details.companyJobId).toBeNull();
  });
});

describe('normalizeStatus', () => {
  it('returns null for unknown values', () => {
    expect(normalizeStatus('Done')).toBeNull();
  });

  it('trims and lowercases', () => {
    expect(normalizeStatus(' Failed ')).toBe('failed');
  });
});
