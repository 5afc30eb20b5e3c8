import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../../errors';
import { createFixtureDirectory } from '../../fixtures';
import type { MailMessage } from '../../types';
import type { SendResult } from '../mailer';
import { defaultSubject, mapConcurrent, runReport } from '../run';

const NOW = new Date('2026-10-18T12:00:00Z');
const now = () => NOW;

function quietLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function fakeMailer() {
  return {
    send: vi.fn(
      async (_message: MailMessage, _bodyHtml: string): Promise<SendResult> => ({
        messageId: 'm-1',
        timestamp: NOW.toISOString(),
      })
    ),
  };
}

describe('runReport', () => {
  it('builds one record per mailbox, largest first', async () => {
    const result = await runReport(
      { scope: { kind: 'all' }, now },
      { directory: createFixtureDirectory(), logger: quietLogger() }
    );

    expect(result.records.map(r => [r.Name, r.Status])).toEqual([
      ['Carol Chen', 'ProhibitSendReceive'],
      ['Bob Baker', 'Warning'],
      ['Dave Doyle', 'ProhibitSend'],
      ['Alice Archer', 'OK'],
      ['Scanner Service', 'OK'],
    ]);
    expect(result.records[0]).toEqual({
      Name: 'Carol Chen',
      Database: 'DB01',
      TotalMB: 2400,
      DeletedMB: 300,
      RecoverableMB: 512,
      Items: 51877,
      LastLogon: '2026-06-01',
      InactiveDays: 139,
      QuotaMB: 2000,
      Status: 'ProhibitSendReceive',
    });
    expect(result.records[2].QuotaMB).toBe(1000);
  });

  it('colors rows by status and flags inactive mailboxes', async () => {
    const { table } = await runReport(
      { scope: { kind: 'all' }, now },
      { directory: createFixtureDirectory(), logger: quietLogger() }
    );

    expect(table).toHaveLength(9);
    expect(table[3]).toBe(
      '<tr style="background-color:#f8d7da"><td>Carol Chen</td><td>DB01</td><td>2400</td><td>300</td><td>512</td><td>51877</td><td>2026-06-01</td><td style="background-color:#d6d8db">139</td><td>2000</td><td>ProhibitSendReceive</td></tr>'
    );
    expect(table[4].startsWith('<tr style="background-color:#fff3cd">')).toBe(true);
    expect(table[5].startsWith('<tr style="background-color:#ffe0b2">')).toBe(true);
    expect(table[6].startsWith('<tr><td>Alice Archer</td>')).toBe(true);
    expect(table[7]).toBe(
      '<tr><td>Scanner Service</td><td>DB02</td><td>35</td><td>0</td><td>0</td><td>212</td><td style="background-color:#d6d8db">Never</td><td></td><td>5000</td><td>OK</td></tr>'
    );
  });

  it('wraps the table in a dated document', async () => {
    const result = await runReport(
      { scope: { kind: 'database', database: 'db02' }, now },
      { directory: createFixtureDirectory(), logger: quietLogger() }
    );

    expect(result.subject).toBe('Mailbox Report - 2026-10-18');
    expect(result.records.map(r => r.Name)).toEqual(['Dave Doyle', 'Scanner Service']);
    expect(result.html).toContain('<title>Mailbox Report - 2026-10-18</title>');
    expect(result.html).toContain(
      '<p class="report-summary">Generated 2026-10-18T12:00:00.000Z for 2 mailbox(es)</p>'
    );
    expect(result.sent).toBeUndefined();
  });

  it('looks up each database quota once', async () => {
    const directory = createFixtureDirectory();
    const quotas = vi.spyOn(directory, 'getDatabaseQuotas');

    await runReport({ scope: { kind: 'all' }, now }, { directory, logger: quietLogger() });

    expect(quotas.mock.calls.map(call => call[0]).sort()).toEqual(['DB01', 'DB02']);
  });

  it('skips folder statistics when recoverable sizes are not wanted', async () => {
    const directory = createFixtureDirectory();
    const folders = vi.spyOn(directory, 'getFolderStatistics');

    const result = await runReport(
      { scope: { kind: 'mailboxes', identities: ['bob'] }, includeRecoverable: false, now },
      { directory, logger: quietLogger() }
    );

    expect(folders).not.toHaveBeenCalled();
    expect(result.records[0].RecoverableMB).toBe(0);
  });

  it('uses the rules it is given', async () => {
    const { table } = await runReport(
      {
        scope: { kind: 'mailboxes', identities: ['alice'] },
        rules: [{ property: 'Items', color: 'orange', filter: 'Items -gt 8000' }],
        now,
      },
      { directory: createFixtureDirectory(), logger: quietLogger() }
    );

    expect(table[3]).toContain('<td style="background-color:orange">8120</td>');
  });

  it('warns when nothing is selected', async () => {
    const logger = quietLogger();
    const result = await runReport(
      { scope: { kind: 'mailboxes', identities: ['nobody'] }, now },
      { directory: createFixtureDirectory(), logger }
    );

    expect(result.records).toEqual([]);
    expect(result.table).toHaveLength(4);
    expect(logger.warn).toHaveBeenCalledWith(
      '[Report] No mailboxes matched the selection; the report will be empty'
    );
  });

  it('mails the document when asked', async () => {
    const mailer = fakeMailer();
    const result = await runReport(
      {
        scope: { kind: 'server', server: 'MBX2' },
        mail: { to: ['admins@example.com'], from: 'reports@example.com', smtpHost: 'smtp.test' },
        now,
      },
      { directory: createFixtureDirectory(), mailer, logger: quietLogger() }
    );

    expect(mailer.send).toHaveBeenCalledTimes(1);
    expect(mailer.send).toHaveBeenCalledWith(
      {
        to: ['admins@example.com'],
        from: 'reports@example.com',
        subject: 'Mailbox Report - 2026-10-18',
        smtpHost: 'smtp.test',
        smtpPort: undefined,
      },
      result.html
    );
    expect(result.sent).toEqual({ messageId: 'm-1', timestamp: '2026-10-18T12:00:00.000Z' });
  });

  it('does not send a report whose coloring failed', async () => {
    const mailer = fakeMailer();
    const logger = quietLogger();

    await expect(
      runReport(
        {
          scope: { kind: 'all' },
          rules: [{ property: 'Name', color: 'red', filter: 'Name -gt 5' }],
          mail: { to: ['admins@example.com'], from: 'reports@example.com', smtpHost: 'smtp.test' },
          now,
        },
        { directory: createFixtureDirectory(), mailer, logger }
      )
    ).rejects.toThrow(ConfigurationError);

    expect(mailer.send).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid options up front', async () => {
    const directory = createFixtureDirectory();
    const listing = vi.spyOn(directory, 'listMailboxes');

    await expect(
      runReport({ scope: { kind: 'all' }, concurrency: 0 }, { directory })
    ).rejects.toThrow('Invalid concurrency: 0');
    await expect(
      runReport(
        {
          scope: { kind: 'all' },
          mail: { to: ['a@example.com'], from: 'b@example.com', smtpHost: 'smtp.test' },
        },
        { directory }
      )
    ).rejects.toThrow('A mail sender is required to send the report');
    expect(listing).not.toHaveBeenCalled();
  });
});

describe('mapConcurrent', () => {
  it('keeps input order and bounds the calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapConcurrent([30, 5, 20, 1], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, delay));
      inFlight--;
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1']);
    expect(peak).toBe(2);
  });

  it('stops starting items once one has failed', async () => {
    const started: number[] = [];

    const run = mapConcurrent([0, 1, 2, 3], 2, async index => {
      started.push(index);
      if (index === 0) throw new Error('lookup failed');
      await new Promise(resolve => setTimeout(resolve, 10));
      return index;
    });

    await expect(run).rejects.toThrow('lookup failed');
    await new Promise(resolve => setTimeout(resolve, 30));
    expect(started).toEqual([0, 1]);
  });

  it('handles an empty list', async () => {
    expect(await mapConcurrent([], 4, async () => 1)).toEqual([]);
  });
});

describe('defaultSubject', () => {
  it('uses the UTC date', () => {
    expect(defaultSubject(new Date('2026-01-02T23:59:00Z'))).toBe('Mailbox Report - 2026-01-02');
  });
});
