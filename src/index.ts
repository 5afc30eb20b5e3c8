/**
 * mailbox-report
 *
 * Mailbox size and quota reports as HTML tables, with conditional row/cell
 * coloring driven by small filter expressions.
 *
 * @example
 * const html = new TableColorizer(tableHtml)
 *   .color({ property: 'Status', color: '#fff3cd', filter: "Status -eq 'Warning'", scope: 'row' })
 *   .color({ property: 'TotalMB', color: 'red', filter: 'TotalMB -gt 2GB' })
 *   .html();
 *
 * // Or a whole run against a management API
 * const { html } = await runReport(
 *   { scope: { kind: 'all' } },
 *   { directory: new HttpMailboxDirectory({ baseUrl: 'https://mail-api.internal' }) }
 * );
 */

// Types
export type {
  ColorScope,
  ColorRule,
  CellValue,
  BoundCell,
  ComparisonOperator,
  FilterOperand,
  FilterNode,
  MailboxScope,
  QuotaThresholds,
  MailboxRef,
  MailboxStatistics,
  FolderStatistics,
  FolderScope,
  QuotaStatus,
  ReportRecord,
  ReportColumn,
  Logger,
  MailMessage,
} from './types';

// Colorizer
export {
  TableColorizer,
  createColorizer,
  colorize,
  colorizeHtml,
  colorizeTable,
  applyColorRule,
  validateColor,
} from './colorize';
export type { ColorizeResult, AppliedRule } from './colorize';

// Filter language
export {
  compileFilter,
  evaluateFilter,
  wildcardToRegExp,
  parseCellValue,
  bindCell,
} from './filter';
export type { CompiledFilter } from './filter';

// Markup
export {
  scanMarkup,
  findRows,
  parseStyle,
  backgroundColorOf,
  setBackgroundColor,
  applyEdits,
  decodeEntities,
  escapeHtml,
} from './markup';
export type {
  MarkupToken,
  TagToken,
  TextToken,
  MarkupAttribute,
  RowMarkup,
  CellMarkup,
  MarkupEdit,
  StyleDeclaration,
} from './markup';

// Errors
export { ConfigurationError, LookupError, TransportError, errorMessage } from './errors';

// Report
export { runReport, mapConcurrent, defaultSubject, DEFAULT_COLOR_RULES } from './report/run';
export type {
  ReportOptions,
  ReportMailOptions,
  ReportDependencies,
  ReportResult,
} from './report/run';
export {
  HttpMailboxDirectory,
  fromMailboxApi,
  fromMailboxesApi,
  fromStatisticsApi,
  fromFolderStatisticsApi,
  fromQuotasApi,
} from './report/directory';
export type { MailboxDirectory, HttpDirectoryOptions } from './report/directory';
export { SmtpMailSender } from './report/mailer';
export type { MailSender, MailTransport, SendResult, SmtpOptions } from './report/mailer';
export { HtmlReportRenderer, toHtmlDocument } from './report/render';
export type { ReportRenderer, RenderOptions, DocumentOptions } from './report/render';
export { buildReportRecord, sortRecords, toMegabytes, REPORT_COLUMNS } from './report/records';
export type { RecordInput } from './report/records';
export {
  resolveQuotas,
  quotaStatus,
  effectiveLimit,
  UNLIMITED_QUOTAS,
} from './report/quota';

// Fixtures
export { createFixtureDirectory, InMemoryMailboxDirectory, sampleData } from './fixtures';
export type { FixtureData, FixtureMailbox } from './fixtures';

// Config & CLI
export { loadConfig, parsePositiveInt } from './config';
export type { ReportConfig } from './config';
export { main, parseCliArgs, parseIdentityList, USAGE } from './cli';
export type { CliOptions, CliDependencies } from './cli';
