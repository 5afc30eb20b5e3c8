/**
 * Mailbox Directory
 *
 * Source of mailboxes, their statistics and quota settings. The report only
 * depends on the MailboxDirectory interface; HttpMailboxDirectory talks to a
 * JSON management API:
 *
 *   GET /mailboxes[?server=|database=]          → { mailboxes: ApiMailbox[] }
 *   GET /mailboxes/{identity}                   → ApiMailbox
 *   GET /mailboxes/{identity}/statistics        → ApiStatistics
 *   GET /mailboxes/{identity}/folders/statistics?scope=RecoverableItems
 *                                               → { folders: [{ name, folderSize }] }
 *   GET /databases/{database}/quotas            → ApiQuotas
 */

import type {
  FolderScope,
  FolderStatistics,
  Logger,
  MailboxRef,
  MailboxScope,
  MailboxStatistics,
  QuotaThresholds,
} from '../types';

export interface MailboxDirectory {
  listMailboxes(scope: MailboxScope): Promise<MailboxRef[]>;
  getStatistics(mailbox: MailboxRef): Promise<MailboxStatistics>;
  getFolderStatistics(mailbox: MailboxRef, folderScope: FolderScope): Promise<FolderStatistics>;
  getDatabaseQuotas(database: string): Promise<QuotaThresholds>;
}

// ============================================================================
// Response Parsing
// ============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, what: string): JsonObject {
  if (!isObject(value)) {
    throw new Error(`Invalid ${what} response: expected an object`);
  }
  return value;
}

function readString(data: JsonObject, key: string, what: string): string {
  const value = data[key];
  if (typeof value !== 'string') {
    throw new Error(`Invalid ${what} response: missing ${key}`);
  }
  return value;
}

function readNumber(data: JsonObject, key: string, what: string): number {
  const value = data[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Invalid ${what} response: missing ${key}`);
  }
  return value;
}

/** Quota values: a number of bytes, or null/absent for unlimited */
function readLimit(data: JsonObject, key: string, what: string): number | null {
  const value = data[key];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'number') {
    throw new Error(`Invalid ${what} response: ${key} must be a number or null`);
  }
  return value;
}

export function fromQuotasApi(json: unknown): QuotaThresholds {
  const data = expectObject(json, 'quotas');
  return {
    warn: readLimit(data, 'issueWarningQuota', 'quotas'),
    prohibitSend: readLimit(data, 'prohibitSendQuota', 'quotas'),
    prohibitSendReceive: readLimit(data, 'prohibitSendReceiveQuota', 'quotas'),
  };
}

export function fromMailboxApi(json: unknown): MailboxRef {
  const data = expectObject(json, 'mailbox');
  const identity = readString(data, 'identity', 'mailbox');
  const useDefaults = data.useDatabaseQuotaDefaults !== false;

  return {
    identity,
    displayName: typeof data.displayName === 'string' ? data.displayName : identity,
    database: readString(data, 'database', 'mailbox'),
    server: typeof data.server === 'string' ? data.server : undefined,
    useDatabaseQuotaDefaults: useDefaults,
    quotas: useDefaults ? undefined : fromQuotasApi(data),
  };
}

export function fromMailboxesApi(json: unknown): MailboxRef[] {
  const data = expectObject(json, 'mailboxes');
  if (!Array.isArray(data.mailboxes)) {
    throw new Error('Invalid mailboxes response: missing mailboxes array');
  }
  return data.mailboxes.map(fromMailboxApi);
}

export function fromStatisticsApi(json: unknown): MailboxStatistics {
  const data = expectObject(json, 'statistics');
  const lastLogon = data.lastLogonTime;
  return {
    totalSize: readNumber(data, 'totalItemSize', 'statistics'),
    deletedSize: readNumber(data, 'totalDeletedItemSize', 'statistics'),
    itemCount: readNumber(data, 'itemCount', 'statistics'),
    lastLogon: typeof lastLogon === 'string' ? lastLogon : null,
  };
}

export function fromFolderStatisticsApi(json: unknown): FolderStatistics {
  const data = expectObject(json, 'folder statistics');
  if (!Array.isArray(data.folders)) {
    throw new Error('Invalid folder statistics response: missing folders array');
  }
  const folderSize = data.folders.reduce<number>(
    (sum, folder) => sum + readNumber(expectObject(folder, 'folder statistics'), 'folderSize', 'folder statistics'),
    0
  );
  return { folderSize };
}

// ============================================================================
// HTTP Directory
// ============================================================================

export interface HttpDirectoryOptions {
  baseUrl: string;
  /** Sent as a bearer token */
  token?: string;
  headers?: Record<string, string>;
  logger?: Logger;
}

export class HttpMailboxDirectory implements MailboxDirectory {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly log: Logger;

  constructor(options: HttpDirectoryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = {
      accept: 'application/json',
      ...(options.token ? { authorization: `Bearer ${options.token}` } : {}),
      ...options.headers,
    };
    this.log = options.logger ?? console;
  }

  async listMailboxes(scope: MailboxScope): Promise<MailboxRef[]> {
    switch (scope.kind) {
      case 'all':
        return fromMailboxesApi(await this.get('/mailboxes', 'mailboxes'));
      case 'server':
        return fromMailboxesApi(
          await this.get(`/mailboxes?server=${encodeURIComponent(scope.server)}`, 'mailboxes')
        );
      case 'database':
        return fromMailboxesApi(
          await this.get(`/mailboxes?database=${encodeURIComponent(scope.database)}`, 'mailboxes')
        );
      case 'mailboxes': {
        const found: MailboxRef[] = [];
        for (const identity of scope.identities) {
          const json = await this.get(`/mailboxes/${encodeURIComponent(identity)}`, 'mailbox', true);
          if (json === undefined) {
            this.log.warn(`[Directory] Mailbox not found, skipping: ${identity}`);
            continue;
          }
          found.push(fromMailboxApi(json));
        }
        return found;
      }
    }
  }

  async getStatistics(mailbox: MailboxRef): Promise<MailboxStatistics> {
    const path = `/mailboxes/${encodeURIComponent(mailbox.identity)}/statistics`;
    return fromStatisticsApi(await this.get(path, 'statistics'));
  }

  async getFolderStatistics(mailbox: MailboxRef, folderScope: FolderScope): Promise<FolderStatistics> {
    const path =
      `/mailboxes/${encodeURIComponent(mailbox.identity)}/folders/statistics` +
      `?scope=${encodeURIComponent(folderScope)}`;
    return fromFolderStatisticsApi(await this.get(path, 'folder statistics'));
  }

  async getDatabaseQuotas(database: string): Promise<QuotaThresholds> {
    const path = `/databases/${encodeURIComponent(database)}/quotas`;
    return fromQuotasApi(await this.get(path, 'quotas'));
  }

  /**
   * GET a JSON document. With `allowMissing`, a 404 yields undefined.
   */
  private async get(path: string, what: string, allowMissing = false): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, { headers: this.headers });
    if (allowMissing && response.status === 404) {
      return undefined;
    }
    if (!response.ok) {
      throw new Error(`Failed to fetch ${what}: ${response.status}`);
    }
    return response.json();
  }
}
