import type { MailboxRef, QuotaStatus, QuotaThresholds } from '../types';

export const UNLIMITED_QUOTAS: QuotaThresholds = {
  warn: null,
  prohibitSend: null,
  prohibitSendReceive: null,
};

/**
 * Thresholds that apply to a mailbox: its own when it opts out of the
 * database defaults, otherwise the database's.
 */
export function resolveQuotas(
  mailbox: MailboxRef,
  databaseQuotas: QuotaThresholds | undefined
): QuotaThresholds {
  if (!mailbox.useDatabaseQuotaDefaults && mailbox.quotas) {
    return mailbox.quotas;
  }
  return databaseQuotas ?? UNLIMITED_QUOTAS;
}

/**
 * Highest tier the mailbox size has reached (each threshold is inclusive)
 */
export function quotaStatus(totalSize: number, quotas: QuotaThresholds): QuotaStatus {
  const reached = (limit: number | null) => limit !== null && totalSize >= limit;

  if (reached(quotas.prohibitSendReceive)) return 'ProhibitSendReceive';
  if (reached(quotas.prohibitSend)) return 'ProhibitSend';
  if (reached(quotas.warn)) return 'Warning';
  return 'OK';
}

/**
 * The limit shown in the report: the first hard limit a user will hit
 */
export function effectiveLimit(quotas: QuotaThresholds): number | null {
  return quotas.prohibitSend ?? quotas.prohibitSendReceive ?? quotas.warn;
}
