/**
 * Report rendering
 *
 * Emits one table row per line, the shape the colorizer reads back:
 *
 *   <table class="report-table">
 *   <colgroup><col/><col/></colgroup>
 *   <tr><th>Name</th><th>TotalMB</th></tr>
 *   <tr><td>Alice</td><td>120.5</td></tr>
 *   </table>
 */

import { escapeHtml } from '../markup';
import type { ReportColumn, ReportRecord } from '../types';
import { REPORT_COLUMNS } from './records';

export interface ReportRenderer {
  toHtmlTable(records: readonly ReportRecord[]): string[];
}

export interface RenderOptions {
  /** Columns to include, in order (default: all) */
  columns?: readonly ReportColumn[];
  /** Custom class prefix (default: 'report') */
  classPrefix?: string;
}

export interface DocumentOptions {
  title: string;
  /** Paragraph under the heading, e.g. the generation time */
  summary?: string;
  classPrefix?: string;
}

function formatCell(value: string | number): string {
  return escapeHtml(typeof value === 'number' ? String(value) : value);
}

export class HtmlReportRenderer implements ReportRenderer {
  private readonly columns: readonly ReportColumn[];
  private readonly classPrefix: string;

  constructor(options: RenderOptions = {}) {
    this.columns = options.columns ?? REPORT_COLUMNS;
    this.classPrefix = options.classPrefix ?? 'report';
  }

  toHtmlTable(records: readonly ReportRecord[]): string[] {
    const headerHtml = this.columns.map(c => `<th>${escapeHtml(c)}</th>`).join('');
    const rows = records.map(
      record => `<tr>${this.columns.map(c => `<td>${formatCell(record[c])}</td>`).join('')}</tr>`
    );

    return [
      `<table class="${this.classPrefix}-table">`,
      `<colgroup>${this.columns.map(() => '<col/>').join('')}</colgroup>`,
      `<tr>${headerHtml}</tr>`,
      ...rows,
      '</table>',
    ];
  }
}

function getDefaultStyles(prefix: string): string {
  return `
    body { font-family: system-ui, sans-serif; padding: 20px; color: #222; }
    h1 { font-size: 1.3em; margin-bottom: 4px; }
    .${prefix}-summary { color: #666; font-size: 0.9em; margin-top: 0; }
    .${prefix}-table { border-collapse: collapse; margin: 8px 0; font-size: 0.9em; }
    .${prefix}-table th, .${prefix}-table td { border: 1px solid #ddd; padding: 6px 10px; text-align: left; }
    .${prefix}-table th { background: #f5f5f5; font-weight: 600; }
  `;
}

/**
 * Wrap table lines in a standalone HTML document (mail body or file)
 */
export function toHtmlDocument(table: readonly string[], options: DocumentOptions): string {
  const prefix = options.classPrefix ?? 'report';
  const summary = options.summary
    ? `<p class="${prefix}-summary">${escapeHtml(options.summary)}</p>\n`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<title>${escapeHtml(options.title)}</title>
<style>${getDefaultStyles(prefix)}</style>
</head>
<body>
<h1>${escapeHtml(options.title)}</h1>
${summary}${table.join('\n')}
</body>
</html>
`;
}
