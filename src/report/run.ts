/**
 * One report run: select mailboxes → collect statistics → render → colorize
 * → optionally mail.
 *
 * @example
 * const result = await runReport(
 *   { scope: { kind: 'database', database: 'DB01' } },
 *   { directory: new HttpMailboxDirectory({ baseUrl }) }
 * );
 * await writeFile('report.html', result.html);
 */

import { colorizeTable } from '../colorize';
import { ConfigurationError, errorMessage } from '../errors';
import type {
  ColorRule,
  MailboxRef,
  MailboxScope,
  Logger,
  MailMessage,
  QuotaThresholds,
  ReportRecord,
} from '../types';
import type { MailboxDirectory } from './directory';
import type { MailSender, SendResult } from './mailer';
import { resolveQuotas } from './quota';
import { buildReportRecord, sortRecords } from './records';
import { HtmlReportRenderer, toHtmlDocument, type ReportRenderer } from './render';

// ============================================================================
// Options
// ============================================================================

export const DEFAULT_COLOR_RULES: readonly ColorRule[] = [
  { property: 'Status', color: '#fff3cd', filter: "Status -eq 'Warning'", scope: 'row' },
  { property: 'Status', color: '#ffe0b2', filter: "Status -eq 'ProhibitSend'", scope: 'row' },
  { property: 'Status', color: '#f8d7da', filter: "Status -eq 'ProhibitSendReceive'", scope: 'row' },
  { property: 'LastLogon', color: '#d6d8db', filter: "LastLogon -eq 'Never'" },
  {
    property: 'InactiveDays',
    color: '#d6d8db',
    filter: 'InactiveDays -ne $null -and InactiveDays -gt 90',
  },
];

export interface ReportMailOptions {
  to: string[];
  from: string;
  smtpHost: string;
  smtpPort?: number;
  /** Default: "Mailbox Report - YYYY-MM-DD" */
  subject?: string;
}

export interface ReportOptions {
  scope: MailboxScope;
  /** Heading of the HTML document (default: the subject) */
  title?: string;
  /** Applied in order (default: DEFAULT_COLOR_RULES) */
  rules?: readonly ColorRule[];
  /** Concurrent statistics lookups (default 4) */
  concurrency?: number;
  /** Fetch Recoverable Items folder sizes (default true) */
  includeRecoverable?: boolean;
  /** Send the report when set */
  mail?: ReportMailOptions;
  /** Clock for InactiveDays and the subject date */
  now?: () => Date;
}

export interface ReportDependencies {
  directory: MailboxDirectory;
  renderer?: ReportRenderer;
  mailer?: MailSender;
  logger?: Logger;
}

export interface ReportResult {
  subject: string;
  records: ReportRecord[];
  /** Colorized table lines */
  table: string[];
  /** Full HTML document */
  html: string;
  sent?: SendResult;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Map with at most `limit` calls in flight; results keep input order.
 * No new call starts after one has rejected.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;
  let failed = false;

  const worker = async () => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

export function defaultSubject(now: Date): string {
  return `Mailbox Report - ${now.toISOString().slice(0, 10)}`;
}

// ============================================================================
// Run
// ============================================================================

export async function runReport(
  options: ReportOptions,
  deps: ReportDependencies
): Promise<ReportResult> {
  const { directory } = deps;
  const log = deps.logger ?? console;
  const renderer = deps.renderer ?? new HtmlReportRenderer();
  const now = (options.now ?? (() => new Date()))();
  const concurrency = options.concurrency ?? 4;
  const includeRecoverable = options.includeRecoverable ?? true;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Invalid concurrency: ${concurrency}`);
  }
  if (options.mail && !deps.mailer) {
    throw new ConfigurationError('A mail sender is required to send the report');
  }

  const subject = options.mail?.subject ?? defaultSubject(now);

  const mailboxes = await directory.listMailboxes(options.scope);
  log.log(`[Report] ${mailboxes.length} mailbox(es) selected`);
  if (mailboxes.length === 0) {
    log.warn('[Report] No mailboxes matched the selection; the report will be empty');
  }

  // One lookup per database, shared by its mailboxes
  const quotaCache = new Map<string, Promise<QuotaThresholds>>();
  const databaseQuotas = (database: string) => {
    let pending = quotaCache.get(database);
    if (!pending) {
      pending = directory.getDatabaseQuotas(database);
      quotaCache.set(database, pending);
    }
    return pending;
  };

  const collect = async (mailbox: MailboxRef): Promise<ReportRecord> => {
    const [statistics, recoverable, dbQuotas] = await Promise.all([
      directory.getStatistics(mailbox),
      includeRecoverable
        ? directory.getFolderStatistics(mailbox, 'RecoverableItems')
        : Promise.resolve(undefined),
      mailbox.useDatabaseQuotaDefaults || !mailbox.quotas
        ? databaseQuotas(mailbox.database)
        : Promise.resolve(undefined),
    ]);

    return buildReportRecord({
      mailbox,
      statistics,
      recoverable,
      quotas: resolveQuotas(mailbox, dbQuotas),
      now,
    });
  };

  const records = sortRecords(await mapConcurrent(mailboxes, concurrency, collect));

  let table: string[];
  try {
    table = colorizeTable(renderer.toHtmlTable(records).join('\n'), options.rules ?? DEFAULT_COLOR_RULES)
      .split('\n');
  } catch (err) {
    log.error(`[Report] Coloring failed, report not produced: ${errorMessage(err)}`);
    throw err;
  }

  const html = toHtmlDocument(table, {
    title: options.title ?? subject,
    summary: `Generated ${now.toISOString()} for ${records.length} mailbox(es)`,
  });

  const result: ReportResult = { subject, records, table, html };

  if (options.mail && deps.mailer) {
    const message: MailMessage = {
      to: options.mail.to,
      from: options.mail.from,
      subject,
      smtpHost: options.mail.smtpHost,
      smtpPort: options.mail.smtpPort,
    };
    result.sent = await deps.mailer.send(message, html);
  }

  return result;
}
