import { describe, it, expect, vi } from 'vitest';
import { createArchiveClient, filingDocumentUrl, type ResponseCache } from '../src/core/sec-client.js';
import { RateLimiter } from '../src/core/rate-limiter.js';
import { DataParseError, NotFoundError, RateLimitError, SecApiError } from '../src/core/errors.js';

const AGENT = 'test-agent test@example.com';

const SUBMISSIONS = JSON.stringify({
  cik: '1067983',
  name: 'Example Capital',
  filings: {
    recent: {
      accessionNumber: ['0000950123-21-014567'],
      filingDate: ['2021-11-15'],
      form: ['13F-HR'],
      reportDate: ['2021-09-30'],
    },
    files: [{ name: 'CIK0001067983-submissions-001.json', filingCount: 1200 }],
  },
});

function respond(...responses: Array<[number, string]>) {
  let call = 0;
  return vi.fn<typeof fetch>(async () => {
    const [status, body] = responses[Math.min(call++, responses.length - 1)];
    return new Response(body, { status });
  });
}

function client(fetchMock: typeof fetch, extra: { cache?: ResponseCache | null; maxRetries?: number; backoffBaseMs?: number } = {}) {
  return createArchiveClient({
    userAgent: AGENT,
    rateLimiter: new RateLimiter(0),
    backoffBaseMs: 1,
    cache: null,
    fetch: fetchMock,
    ...extra,
  });
}

describe('createArchiveClient', () => {
  it('fetches the submissions index with the identifying user agent', async () => {
    const fetchMock = respond([200, SUBMISSIONS]);
    const submissions = await client(fetchMock).getSubmissions('1067983');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('https://data.sec.gov/submissions/CIK0001067983.json');
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ headers: { 'User-Agent': AGENT } });
    expect(submissions).toEqual({
      cik: '1067983',
      name: 'Example Capital',
      filings: {
        recent: {
          accessionNumber: ['0000950123-21-014567'],
          filingDate: ['2021-11-15'],
          form: ['13F-HR'],
        },
        files: [{ name: 'CIK0001067983-submissions-001.json', filingCount: 1200 }],
      },
    });
  });

  it('defaults missing filing columns to empty lists', async () => {
    const fetchMock = respond([200, JSON.stringify({ cik: 1, name: 'X', filings: {} })]);
    const submissions = await client(fetchMock).getSubmissions('1');
    expect(submissions.cik).toBe('1');
    expect(submissions.filings.recent).toEqual({ accessionNumber: [], filingDate: [], form: [] });
    expect(submissions.filings.files).toEqual([]);
  });

  it('fetches index shards by name', async () => {
    const fetchMock = respond([200, JSON.stringify({ accessionNumber: ['a'], filingDate: ['2009-02-14'], form: ['13F-HR'] })]);
    const shard = await client(fetchMock).getSubmissionsShard('CIK0001067983-submissions-001.json');
    expect(fetchMock.mock.calls[0][0]).toBe('https://data.sec.gov/submissions/CIK0001067983-submissions-001.json');
    expect(shard.form).toEqual(['13F-HR']);
  });

  it('fetches filing documents from the archive path', async () => {
    const fetchMock = respond([200, '<informationTable/>']);
    const body = await client(fetchMock).getFilingDocument('1067983', '0000950123-21-014567', 'infotable.xml');
    expect(body).toBe('<informationTable/>');
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://www.sec.gov/Archives/edgar/data/0001067983/000095012321014567/infotable.xml'
    );
  });

  it('raises NotFoundError on 404 without retrying', async () => {
    const fetchMock = respond([404, 'missing']);
    await expect(client(fetchMock).getFilingDocument('1', 'a-b', 'infotable.xml')).rejects.toBeInstanceOf(NotFoundError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not retry server errors', async () => {
    const fetchMock = respond([500, 'oops'], [200, 'ok']);
    const err = await client(fetchMock).getFilingDocument('1', 'a-b', 'x.xml').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SecApiError);
    if (err instanceof SecApiError) expect(err.statusCode).toBe(500);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('explains a 403 as a user agent problem', async () => {
    const fetchMock = respond([403, 'forbidden']);
    await expect(client(fetchMock).getSubmissions('1')).rejects.toThrow(/SEC_USER_AGENT/);
  });

  it('retries 429 responses with backoff', async () => {
    const fetchMock = respond([429, ''], [429, ''], [200, 'ok']);
    const body = await client(fetchMock).getFilingDocument('1', 'a-b', 'x.xml');
    expect(body).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after the retry limit', async () => {
    const fetchMock = respond([429, '']);
    await expect(client(fetchMock, { maxRetries: 2 }).getFilingDocument('1', 'a-b', 'x.xml'))
      .rejects.toBeInstanceOf(RateLimitError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not back off after the final rate-limited attempt', async () => {
    const fetchMock = respond([429, '']);
    const start = Date.now();
    await expect(client(fetchMock, { maxRetries: 1, backoffBaseMs: 60_000 }).getFilingDocument('1', 'a-b', 'x.xml'))
      .rejects.toBeInstanceOf(RateLimitError);
    expect(Date.now() - start).toBeLessThan(1000);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('wraps network failures', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => { throw new TypeError('fetch failed'); });
    await expect(client(fetchMock).getFilingDocument('1', 'a-b', 'x.xml'))
      .rejects.toThrow('Network error fetching https://www.sec.gov/Archives/edgar/data/0000000001/ab/x.xml: fetch failed');
  });

  it('reports a non-JSON index as DataParseError', async () => {
    const fetchMock = respond([200, '<html>maintenance</html>']);
    await expect(client(fetchMock).getSubmissions('1')).rejects.toBeInstanceOf(DataParseError);
  });

  it('serves repeated requests from the response cache', async () => {
    const store = new Map<string, string>();
    const cache: ResponseCache = {
      get: url => store.get(url) ?? null,
      set: (url, body) => { store.set(url, body); },
    };
    const fetchMock = respond([200, 'doc']);
    const archive = client(fetchMock, { cache });

    await archive.getFilingDocument('1', 'a-b', 'x.xml');
    const again = await archive.getFilingDocument('1', 'a-b', 'x.xml');

    expect(again).toBe('doc');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not cache failures', async () => {
    const store = new Map<string, string>();
    const cache: ResponseCache = {
      get: url => store.get(url) ?? null,
      set: (url, body) => { store.set(url, body); },
    };
    const fetchMock = respond([404, 'missing']);
    await expect(client(fetchMock, { cache }).getFilingDocument('1', 'a-b', 'x.xml')).rejects.toThrow(NotFoundError);
    expect(store.size).toBe(0);
  });
});

describe('filingDocumentUrl', () => {
  it('pads the CIK and strips dashes from the accession number', () => {
    expect(filingDocumentUrl('https://archive.test', '320193', '0000320193-23-000077', 'primary_doc.xml'))
      .toBe('https://archive.test/0000320193/000032019323000077/primary_doc.xml');
  });
});
