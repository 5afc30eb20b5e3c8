import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { HttpMailboxDirectory, fromMailboxApi, fromStatisticsApi } from '../directory';
import apiSample from './fixtures/mailbox-api.json';

type Route = { status?: number; body?: unknown };

function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (url: string) => {
    const route = routes[url];
    if (!route) {
      return new Response('not found', { status: 404 });
    }
    return new Response(JSON.stringify(route.body ?? null), { status: route.status ?? 200 });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const BASE = 'https://mail-api.test';

describe('HttpMailboxDirectory', () => {
  let directory: HttpMailboxDirectory;

  beforeEach(() => {
    directory = new HttpMailboxDirectory({ baseUrl: `${BASE}/`, token: 'test-token' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('lists every mailbox with auth headers', async () => {
    const fetchMock = stubFetch({ [`${BASE}/mailboxes`]: { body: apiSample.mailboxes } });

    const mailboxes = await directory.listMailboxes({ kind: 'all' });

    expect(fetchMock).toHaveBeenCalledWith(`${BASE}/mailboxes`, {
      headers: { accept: 'application/json', authorization: 'Bearer test-token' },
    });
    expect(mailboxes).toEqual([
      {
        identity: 'jdoe',
        displayName: 'Jane Doe',
        database: 'DB01',
        server: 'MBX1',
        useDatabaseQuotaDefaults: true,
        quotas: undefined,
      },
      {
        identity: 'archive01',
        displayName: 'archive01',
        database: 'DB02',
        server: undefined,
        useDatabaseQuotaDefaults: false,
        quotas: { warn: 943718400, prohibitSend: 1048576000, prohibitSendReceive: null },
      },
    ]);
  });

  it('filters by database and server through the query string', async () => {
    const fetchMock = stubFetch({
      [`${BASE}/mailboxes?database=DB%2001`]: { body: { mailboxes: [] } },
      [`${BASE}/mailboxes?server=MBX1`]: { body: { mailboxes: [] } },
    });

    await directory.listMailboxes({ kind: 'database', database: 'DB 01' });
    await directory.listMailboxes({ kind: 'server', server: 'MBX1' });

    expect(fetchMock.mock.calls.map(call => call[0])).toEqual([
      `${BASE}/mailboxes?database=DB%2001`,
      `${BASE}/mailboxes?server=MBX1`,
    ]);
  });

  it('skips listed identities that do not exist', async () => {
    stubFetch({ [`${BASE}/mailboxes/jdoe`]: { body: apiSample.mailboxes.mailboxes[0] } });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const mailboxes = await directory.listMailboxes({
      kind: 'mailboxes',
      identities: ['jdoe', 'ghost'],
    });

    expect(mailboxes.map(m => m.identity)).toEqual(['jdoe']);
    expect(warn).toHaveBeenCalledWith('[Directory] Mailbox not found, skipping: ghost');
  });

  it('reports skipped identities through the injected logger', async () => {
    stubFetch({});
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const quiet = new HttpMailboxDirectory({ baseUrl: BASE, logger });
    const warn = vi.spyOn(console, 'warn');

    expect(await quiet.listMailboxes({ kind: 'mailboxes', identities: ['ghost'] })).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('[Directory] Mailbox not found, skipping: ghost');
    expect(warn).not.toHaveBeenCalled();
  });

  it('reads statistics, folder sizes and quotas', async () => {
    stubFetch({
      [`${BASE}/mailboxes/jdoe/statistics`]: { body: apiSample.statistics },
      [`${BASE}/mailboxes/jdoe/folders/statistics?scope=RecoverableItems`]: {
        body: apiSample.folderStatistics,
      },
      [`${BASE}/databases/DB01/quotas`]: { body: apiSample.quotas },
    });
    const mailbox = fromMailboxApi(apiSample.mailboxes.mailboxes[0]);

    expect(await directory.getStatistics(mailbox)).toEqual({
      totalSize: 2097152,
      deletedSize: 1048576,
      itemCount: 42,
      lastLogon: '2026-10-12T06:15:00Z',
    });
    expect(await directory.getFolderStatistics(mailbox, 'RecoverableItems')).toEqual({
      folderSize: 1524,
    });
    expect(await directory.getDatabaseQuotas('DB01')).toEqual({
      warn: 1887436800,
      prohibitSend: 2097152000,
      prohibitSendReceive: 2411724800,
    });
  });

  it('throws on error responses', async () => {
    stubFetch({ [`${BASE}/databases/DB01/quotas`]: { status: 503, body: {} } });

    await expect(directory.getDatabaseQuotas('DB01')).rejects.toThrow('Failed to fetch quotas: 503');
    await expect(directory.listMailboxes({ kind: 'all' })).rejects.toThrow(
      'Failed to fetch mailboxes: 404'
    );
  });
});

describe('response parsing', () => {
  it('rejects responses without required fields', () => {
    expect(() => fromStatisticsApi({ itemCount: 1 })).toThrow(
      'Invalid statistics response: missing totalItemSize'
    );
    expect(() => fromMailboxApi([])).toThrow('Invalid mailbox response: expected an object');
  });

  it('reads a missing logon time as never', () => {
    expect(
      fromStatisticsApi({ totalItemSize: 1, totalDeletedItemSize: 0, itemCount: 0, lastLogonTime: null })
    ).toEqual({ totalSize: 1, deletedSize: 0, itemCount: 0, lastLogon: null });
  });
});
