import { describe, it, expect } from 'vitest';
import type { MailboxRef, ReportRecord } from '../../types';
import { UNLIMITED_QUOTAS } from '../quota';
import { REPORT_COLUMNS, buildReportRecord, sortRecords, toMegabytes } from '../records';

const MB = 1024 * 1024;
const NOW = new Date('2026-10-18T00:00:00Z');

const MAILBOX: MailboxRef = {
  identity: 'test.user',
  displayName: 'Test User',
  database: 'DB9',
  useDatabaseQuotaDefaults: true,
};

describe('buildReportRecord', () => {
  it('flattens statistics and quotas into a row', () => {
    const record = buildReportRecord({
      mailbox: MAILBOX,
      statistics: {
        totalSize: 1.5 * MB,
        deletedSize: 0,
        itemCount: 10,
        lastLogon: '2026-10-01T12:00:00Z',
      },
      recoverable: { folderSize: 0.5 * MB },
      quotas: { warn: 1 * MB, prohibitSend: 2 * MB, prohibitSendReceive: null },
      now: NOW,
    });

    expect(record).toEqual({
      Name: 'Test User',
      Database: 'DB9',
      TotalMB: 1.5,
      DeletedMB: 0,
      RecoverableMB: 0.5,
      Items: 10,
      LastLogon: '2026-10-01',
      InactiveDays: 16,
      QuotaMB: 2,
      Status: 'Warning',
    });
    expect(Object.keys(record)).toEqual([...REPORT_COLUMNS]);
  });

  it('marks mailboxes that were never logged on to', () => {
    const record = buildReportRecord({
      mailbox: MAILBOX,
      statistics: { totalSize: MB, deletedSize: 0, itemCount: 1, lastLogon: null },
      quotas: UNLIMITED_QUOTAS,
      now: NOW,
    });

    expect(record.LastLogon).toBe('Never');
    expect(record.InactiveDays).toBe('');
    expect(record.QuotaMB).toBe('');
    expect(record.RecoverableMB).toBe(0);
    expect(record.Status).toBe('OK');
  });

  it('treats unreadable timestamps as never and clamps future ones', () => {
    const build = (lastLogon: string) =>
      buildReportRecord({
        mailbox: MAILBOX,
        statistics: { totalSize: 0, deletedSize: 0, itemCount: 0, lastLogon },
        quotas: UNLIMITED_QUOTAS,
        now: NOW,
      });

    expect(build('not a date').LastLogon).toBe('Never');
    expect(build('2026-10-20T00:00:00Z').InactiveDays).toBe(0);
  });
});

describe('toMegabytes', () => {
  it('rounds to two decimals', () => {
    expect(toMegabytes(1234567)).toBe(1.18);
    expect(toMegabytes(0)).toBe(0);
  });
});

describe('sortRecords', () => {
  it('puts the largest mailboxes first, then sorts by name', () => {
    const row = (Name: string, TotalMB: number): ReportRecord => ({
      Name,
      Database: 'DB01',
      TotalMB,
      DeletedMB: 0,
      RecoverableMB: 0,
      Items: 0,
      LastLogon: 'Never',
      InactiveDays: '',
      QuotaMB: '',
      Status: 'OK',
    });
    const input = [row('b', 10), row('c', 20), row('a', 10)];

    expect(sortRecords(input).map(r => r.Name)).toEqual(['c', 'a', 'b']);
    expect(input.map(r => r.Name)).toEqual(['b', 'c', 'a']);
  });
});
