/**
 * Sample Fixtures
 *
 * An in-memory mailbox directory for demos and tests, so a report can be
 * produced without a management API.
 *
 * @example
 * const directory = createFixtureDirectory();
 * const { html } = await runReport({ scope: { kind: 'all' } }, { directory });
 */

import type { MailboxDirectory } from './report/directory';
import type {
  FolderScope,
  FolderStatistics,
  MailboxRef,
  MailboxScope,
  MailboxStatistics,
  QuotaThresholds,
} from './types';

// ============================================================================
// Fixture Types
// ============================================================================

export interface FixtureMailbox {
  mailbox: MailboxRef;
  statistics: MailboxStatistics;
  /** Folder sizes in bytes by folder scope */
  folders?: Partial<Record<FolderScope, number>>;
}

export interface FixtureData {
  mailboxes: FixtureMailbox[];
  /** Quotas by database name */
  databases: Record<string, QuotaThresholds>;
}

// ============================================================================
// Embedded Fixture
// ============================================================================

const MB = 1024 * 1024;

export const sampleData: FixtureData = {
  databases: {
    DB01: { warn: 1800 * MB, prohibitSend: 2000 * MB, prohibitSendReceive: 2300 * MB },
    DB02: { warn: 4500 * MB, prohibitSend: 5000 * MB, prohibitSendReceive: null },
  },
  mailboxes: [
    {
      mailbox: { identity: 'alice', displayName: 'Alice Archer', database: 'DB01', server: 'MBX1', useDatabaseQuotaDefaults: true },
      statistics: { totalSize: 950 * MB, deletedSize: 12 * MB, itemCount: 8120, lastLogon: '2026-10-17T08:30:00Z' },
      folders: { RecoverableItems: 40 * MB },
    },
    {
      mailbox: { identity: 'bob', displayName: 'Bob Baker', database: 'DB01', server: 'MBX1', useDatabaseQuotaDefaults: true },
      statistics: { totalSize: 1900 * MB, deletedSize: 150 * MB, itemCount: 24410, lastLogon: '2026-10-16T17:05:00Z' },
      folders: { RecoverableItems: 220 * MB },
    },
    {
      mailbox: { identity: 'carol', displayName: 'Carol Chen', database: 'DB01', server: 'MBX1', useDatabaseQuotaDefaults: true },
      statistics: { totalSize: 2400 * MB, deletedSize: 300 * MB, itemCount: 51877, lastLogon: '2026-06-01T09:00:00Z' },
      folders: { RecoverableItems: 512 * MB },
    },
    {
      mailbox: {
        identity: 'dave',
        displayName: 'Dave Doyle',
        database: 'DB02',
        server: 'MBX2',
        useDatabaseQuotaDefaults: false,
        quotas: { warn: 900 * MB, prohibitSend: 1000 * MB, prohibitSendReceive: 1200 * MB },
      },
      statistics: { totalSize: 1050 * MB, deletedSize: 5 * MB, itemCount: 9034, lastLogon: '2026-10-18T07:45:00Z' },
    },
    {
      mailbox: { identity: 'svc-scanner', displayName: 'Scanner Service', database: 'DB02', server: 'MBX2', useDatabaseQuotaDefaults: true },
      statistics: { totalSize: 35 * MB, deletedSize: 0, itemCount: 212, lastLogon: null },
    },
  ],
};

// ============================================================================
// In-Memory Directory
// ============================================================================

export class InMemoryMailboxDirectory implements MailboxDirectory {
  constructor(private readonly data: FixtureData) {}

  async listMailboxes(scope: MailboxScope): Promise<MailboxRef[]> {
    const all = this.data.mailboxes.map(m => m.mailbox);
    switch (scope.kind) {
      case 'all':
        return all;
      case 'server':
        return all.filter(m => m.server?.toLowerCase() === scope.server.toLowerCase());
      case 'database':
        return all.filter(m => m.database.toLowerCase() === scope.database.toLowerCase());
      case 'mailboxes': {
        const wanted = new Set(scope.identities.map(id => id.toLowerCase()));
        return all.filter(m => wanted.has(m.identity.toLowerCase()));
      }
    }
  }

  async getStatistics(mailbox: MailboxRef): Promise<MailboxStatistics> {
    return this.entry(mailbox).statistics;
  }

  async getFolderStatistics(mailbox: MailboxRef, folderScope: FolderScope): Promise<FolderStatistics> {
    return { folderSize: this.entry(mailbox).folders?.[folderScope] ?? 0 };
  }

  async getDatabaseQuotas(database: string): Promise<QuotaThresholds> {
    const quotas = this.data.databases[database];
    if (!quotas) {
      throw new Error(`Unknown database: ${database}`);
    }
    return quotas;
  }

  private entry(mailbox: MailboxRef): FixtureMailbox {
    const entry = this.data.mailboxes.find(m => m.mailbox.identity === mailbox.identity);
    if (!entry) {
      throw new Error(`Unknown mailbox: ${mailbox.identity}`);
    }
    return entry;
  }
}

/**
 * Directory over the embedded sample data (or your own fixture)
 */
export function createFixtureDirectory(data: FixtureData = sampleData): InMemoryMailboxDirectory {
  return new InMemoryMailboxDirectory(data);
}
