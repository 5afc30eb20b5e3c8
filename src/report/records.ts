import type {
  FolderStatistics,
  MailboxRef,
  MailboxStatistics,
  QuotaThresholds,
  ReportColumn,
  ReportRecord,
} from '../types';
import { effectiveLimit, quotaStatus } from './quota';

/** Column order of the rendered table */
export const REPORT_COLUMNS: readonly ReportColumn[] = [
  'Name',
  'Database',
  'TotalMB',
  'DeletedMB',
  'RecoverableMB',
  'Items',
  'LastLogon',
  'InactiveDays',
  'QuotaMB',
  'Status',
];

const MB = 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;

export function toMegabytes(bytes: number): number {
  return Math.round((bytes / MB) * 100) / 100;
}

export interface RecordInput {
  mailbox: MailboxRef;
  statistics: MailboxStatistics;
  recoverable?: FolderStatistics;
  quotas: QuotaThresholds;
  /** Reference time for InactiveDays */
  now: Date;
}

/**
 * Flatten one mailbox into a table row
 */
export function buildReportRecord(input: RecordInput): ReportRecord {
  const { mailbox, statistics, recoverable, quotas, now } = input;

  const logon = statistics.lastLogon ? new Date(statistics.lastLogon) : null;
  const validLogon = logon && !isNaN(logon.getTime()) ? logon : null;
  const limit = effectiveLimit(quotas);

  return {
    Name: mailbox.displayName,
    Database: mailbox.database,
    TotalMB: toMegabytes(statistics.totalSize),
    DeletedMB: toMegabytes(statistics.deletedSize),
    RecoverableMB: toMegabytes(recoverable?.folderSize ?? 0),
    Items: statistics.itemCount,
    LastLogon: validLogon ? validLogon.toISOString().slice(0, 10) : 'Never',
    InactiveDays: validLogon
      ? Math.max(0, Math.floor((now.getTime() - validLogon.getTime()) / DAY_MS))
      : '',
    QuotaMB: limit === null ? '' : toMegabytes(limit),
    Status: quotaStatus(statistics.totalSize, quotas),
  };
}

/**
 * Largest mailboxes first, name as tie-breaker
 */
export function sortRecords(records: ReportRecord[]): ReportRecord[] {
  return [...records].sort((a, b) => b.TotalMB - a.TotalMB || a.Name.localeCompare(b.Name));
}
