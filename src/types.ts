/**
 * Mailbox Report Types
 *
 * Two layers:
 *   Colorizer  - rules, cell values and filter trees (pure, synchronous)
 *   Reporting  - mailboxes, statistics, quotas and report records
 */

// ============================================================================
// Colorizer
// ============================================================================

/** Whether a matching rule styles the whole row or just the target cell */
export type ColorScope = 'cell' | 'row';

/**
 * One colorize pass.
 *
 * @example
 * { property: 'Size', color: 'red', filter: 'Size -gt 100', scope: 'cell' }
 */
export interface ColorRule {
  /** Header text of the column the filter reads (case-insensitive) */
  property: string;
  /** CSS named color, hex color or rgb()/rgba() */
  color: string;
  /** Filter expression referencing `property`, e.g. "Size -gt 100" */
  filter: string;
  /** Defaults to 'cell' */
  scope?: ColorScope;
}

/** Typed content of a data cell */
export type CellValue = string | number;

/** A data cell as seen by the filter evaluator */
export interface BoundCell {
  /** Entity-decoded, trimmed text */
  text: string;
  /** Number when the text parses as one, otherwise the text */
  value: CellValue;
}

// ============================================================================
// Filter Expression Tree
// ============================================================================

export type ComparisonOperator =
  | 'eq'
  | 'ne'
  | 'lt'
  | 'le'
  | 'gt'
  | 'ge'
  | 'like'
  | 'notlike'
  | 'match'
  | 'notmatch';

/** Literal comparand, or the current row's cell */
export type FilterOperand =
  | { kind: 'value' }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' };

export type FilterNode =
  | {
      type: 'comparison';
      operator: ComparisonOperator;
      caseSensitive: boolean;
      left: FilterOperand;
      right: FilterOperand;
      /** Compiled once for like/match operators */
      pattern?: RegExp;
    }
  | { type: 'and' | 'or' | 'xor'; left: FilterNode; right: FilterNode }
  | { type: 'not'; operand: FilterNode };

// ============================================================================
// Mailboxes & Statistics
// ============================================================================

/** Mutually exclusive mailbox selection */
export type MailboxScope =
  | { kind: 'all' }
  | { kind: 'server'; server: string }
  | { kind: 'database'; database: string }
  | { kind: 'mailboxes'; identities: string[] };

/** Quota thresholds in bytes; null means unlimited */
export interface QuotaThresholds {
  warn: number | null;
  prohibitSend: number | null;
  prohibitSendReceive: number | null;
}

export interface MailboxRef {
  identity: string;
  displayName: string;
  database: string;
  server?: string;
  /** When false, `quotas` overrides the database defaults */
  useDatabaseQuotaDefaults: boolean;
  quotas?: QuotaThresholds;
}

export interface MailboxStatistics {
  /** Bytes */
  totalSize: number;
  /** Bytes */
  deletedSize: number;
  itemCount: number;
  /** ISO-8601 timestamp, null if the mailbox has never been logged on to */
  lastLogon: string | null;
}

export interface FolderStatistics {
  /** Bytes */
  folderSize: number;
}

/** Folder groups whose combined size can be requested */
export type FolderScope = 'RecoverableItems' | 'Inbox' | 'SentItems' | 'DeletedItems' | 'All';

// ============================================================================
// Report
// ============================================================================

export type QuotaStatus = 'OK' | 'Warning' | 'ProhibitSend' | 'ProhibitSendReceive';

/** One table row; keys are the table's header texts */
export interface ReportRecord {
  Name: string;
  Database: string;
  TotalMB: number;
  DeletedMB: number;
  RecoverableMB: number;
  Items: number;
  LastLogon: string;
  InactiveDays: number | '';
  QuotaMB: number | '';
  Status: QuotaStatus;
}

export type ReportColumn = keyof ReportRecord;

/** Where progress and failures are reported (console by default) */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface MailMessage {
  to: string[];
  from: string;
  subject: string;
  smtpHost: string;
  smtpPort?: number;
}
