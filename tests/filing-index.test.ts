import { describe, it, expect, afterEach, vi } from 'vitest';
import { filingQuarter, listHoldingsFilings, toFilingIndexEntries } from '../src/processing/filing-index.js';
import { createArchiveClient } from '../src/core/sec-client.js';
import { RateLimiter } from '../src/core/rate-limiter.js';
import { FakeArchiveClient, columns } from './helpers/fake-archive.js';

const RANGE = { startYear: 2010, endYear: 2024 };

describe('filingQuarter', () => {
  it.each([
    ['2021-01-05', 1],
    ['2021-03-31', 1],
    ['2021-04-01', 2],
    ['2021-08-14', 3],
    ['2021-11-15', 4],
    ['2021-12-31', 4],
  ])('%s is Q%d', (date, quarter) => {
    expect(filingQuarter(date)).toBe(quarter);
  });

  it('rejects an impossible month', () => {
    expect(() => filingQuarter('2021-13-01')).toThrow(RangeError);
  });
});

describe('toFilingIndexEntries', () => {
  it('keeps holdings reports within the year range', () => {
    const entries = toFilingIndexEntries('0000000001', columns([
      ['0000000001-21-000004', '2021-11-15', '13F-HR'],
      ['0000000001-21-000003', '2021-10-01', '13F-HR/A'],
      ['0000000001-21-000002', '2021-09-01', '10-K'],
      ['0000000001-09-000001', '2009-05-15', '13F-HR'],
    ]), RANGE);

    expect(entries).toEqual([{
      cik: '0000000001',
      accessionNumber: '0000000001-21-000004',
      filingDate: '2021-11-15',
      formType: '13F-HR',
      filingYear: 2021,
      filingQuarter: 4,
    }]);
  });

  it('drops rows with an unreadable date', () => {
    const entries = toFilingIndexEntries('0000000001', columns([
      ['0000000001-21-000001', '2021/05/15', '13F-HR'],
      ['0000000001-21-000002', '2021-00-15', '13F-HR'],
      ['0000000001-21-000003', '', '13F-HR'],
    ]), RANGE);
    expect(entries).toEqual([]);
  });

  it('tolerates columns of unequal length', () => {
    const entries = toFilingIndexEntries('0000000001', {
      accessionNumber: ['0000000001-21-000001'],
      filingDate: ['2021-05-15', '2021-08-15'],
      form: ['13F-HR', '13F-HR'],
    }, RANGE);
    expect(entries.map(e => e.accessionNumber)).toEqual(['0000000001-21-000001']);
  });
});

describe('listHoldingsFilings', () => {
  it('merges the recent list with every shard, newest first', async () => {
    const client = new FakeArchiveClient();
    client.addSubmissions('1', columns([
      ['A-2', '2022-05-15', '13F-HR'],
      ['A-4', '2023-02-14', '13F-HR'],
    ]), ['CIK0000000001-submissions-001.json']);
    client.shards.set('CIK0000000001-submissions-001.json', columns([
      ['A-1', '2015-08-14', '13F-HR'],
      ['A-3', '2022-11-14', '13F-HR'],
    ]));

    const entries = await listHoldingsFilings({ client }, '1', RANGE);
    expect(entries.map(e => e.accessionNumber)).toEqual(['A-4', 'A-3', 'A-2', 'A-1']);
    expect(entries.every(e => e.cik === '0000000001')).toBe(true);
  });

  it('keeps the rest of the index when one shard fails', async () => {
    const client = new FakeArchiveClient();
    client.addSubmissions('1', columns([['A-5', '2021-11-15', '13F-HR']]), ['shard-1.json', 'shard-2.json', 'shard-3.json']);
    client.shards.set('shard-1.json', columns([['A-4', '2020-11-15', '13F-HR']]));
    client.shards.set('shard-2.json', 500);
    client.shards.set('shard-3.json', columns([['A-2', '2018-11-15', '13F-HR']]));

    const entries = await listHoldingsFilings({ client }, '1', RANGE);
    expect(entries.map(e => e.accessionNumber)).toEqual(['A-5', 'A-4', 'A-2']);
    expect(client.calls).toContain('shard:shard-3.json');
  });

  it('removes filings listed twice', async () => {
    const client = new FakeArchiveClient();
    client.addSubmissions('1', columns([['A-1', '2021-05-15', '13F-HR']]), ['shard-1.json']);
    client.shards.set('shard-1.json', columns([['A-1', '2021-05-15', '13F-HR']]));

    const entries = await listHoldingsFilings({ client }, '1', RANGE);
    expect(entries).toHaveLength(1);
  });

  it('returns nothing when the institution has no index', async () => {
    const client = new FakeArchiveClient();
    const entries = await listHoldingsFilings({ client }, '99', RANGE);
    expect(entries).toEqual([]);
  });
});

describe('listHoldingsFilings through the archive client', () => {
  const DATA_URL = 'https://data.test';

  const bodies = new Map<string, string>([
    [`${DATA_URL}/submissions/CIK0000000001.json`, JSON.stringify({
      cik: '1',
      name: 'Alpha Capital',
      filings: {
        recent: columns([['A-3', '2022-05-15', '13F-HR']]),
        files: [{ name: 'shard-1.json' }, { name: 'shard-2.json' }],
      },
    })],
    [`${DATA_URL}/submissions/shard-1.json`, JSON.stringify(columns([['A-2', '2019-05-15', '13F-HR']]))],
    [`${DATA_URL}/submissions/shard-2.json`, JSON.stringify(columns([['A-1', '2016-05-15', '13F-HR']]))],
    [`${DATA_URL}/submissions/CIK0000000002.json`, JSON.stringify({
      cik: '2',
      name: 'Beta Partners',
      filings: { recent: columns([['B-1', '2021-05-15', '13F-HR']]), files: [] },
    })],
  ]);

  function archive(limiter: RateLimiter) {
    const requests: Array<{ url: string; at: number }> = [];
    const fetchMock = vi.fn<typeof fetch>(async input => {
      const url = String(input);
      requests.push({ url, at: Date.now() });
      const body = bodies.get(url);
      return body === undefined ? new Response('', { status: 404 }) : new Response(body, { status: 200 });
    });
    const client = createArchiveClient({
      userAgent: 'test-agent test@example.com',
      dataUrl: DATA_URL,
      rateLimiter: limiter,
      cache: null,
      fetch: fetchMock,
    });
    return { client, requests };
  }

  /** Step the fake clock until `promise` settles */
  async function settle<T>(promise: Promise<T>): Promise<T> {
    let done = false;
    const tracked = promise.finally(() => { done = true; });
    for (let i = 0; i < 400 && !done; i++) {
      await vi.advanceTimersByTimeAsync(5);
    }
    return tracked;
  }

  afterEach(() => {
    vi.useRealTimers();
  });

  it('spaces shard fetches by the limiter interval', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const t0 = Date.now();

    const limiter = new RateLimiter(100);
    const acquire = vi.spyOn(limiter, 'acquire');
    const { client, requests } = archive(limiter);

    const entries = await settle(listHoldingsFilings({ client }, '1', RANGE));

    expect(entries.map(e => e.accessionNumber)).toEqual(['A-3', 'A-2', 'A-1']);
    expect(acquire).toHaveBeenCalledTimes(3);
    expect(requests.map(r => [r.url.replace(DATA_URL, ''), r.at - t0])).toEqual([
      ['/submissions/CIK0000000001.json', 0],
      ['/submissions/shard-1.json', 100],
      ['/submissions/shard-2.json', 200],
    ]);
  });

  it('shares one request budget across institutions crawled at once', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const t0 = Date.now();

    const limiter = new RateLimiter(100);
    const acquire = vi.spyOn(limiter, 'acquire');
    const { client, requests } = archive(limiter);

    const [alpha, beta] = await settle(Promise.all([
      listHoldingsFilings({ client }, '1', RANGE),
      listHoldingsFilings({ client }, '2', RANGE),
    ]));

    expect(alpha).toHaveLength(3);
    expect(beta).toHaveLength(1);
    expect(acquire).toHaveBeenCalledTimes(4);
    expect(requests.map(r => r.at - t0).sort((a, b) => a - b)).toEqual([0, 100, 200, 300]);
  });
});
