import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, utimesSync, existsSync } from 'fs';
import { createServer } from 'http';
import type { Server, ServerResponse } from 'http';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  readCache,
  writeCache,
  isStale,
  fiveHourUtilization,
} from '../usage/cache.js';
import { readAccessToken } from '../usage/credentials.js';
import { fetchUsage } from '../usage/client.js';
import type { FetchResult, UsageFetcher } from '../usage/client.js';
import { getFiveHourUtilization } from '../usage/five-hour.js';

let tmpDir: string;
let cachePath: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'statusline-usage-'));
  cachePath = join(tmpDir, 'usage-cache');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

/** Write a cache file whose mtime is ageMs before now. */
function writeAgedCache(body: string, now: number, ageMs: number): void {
  writeFileSync(cachePath, body);
  const mtime = (now - ageMs) / 1000;
  utimesSync(cachePath, mtime, mtime);
}

function fakeFetcher(result: FetchResult): UsageFetcher & { calls: string[] } {
  const calls: string[] = [];
  const fetcher = async (token: string): Promise<FetchResult> => {
    calls.push(token);
    return result;
  };
  return Object.assign(fetcher, { calls });
}

// ---------------------------------------------------------------------------
// Cache primitives
// ---------------------------------------------------------------------------

describe('readCache', () => {
  it('should return null for a missing file', () => {
    expect(readCache(cachePath)).toBeNull();
  });

  it('should return null for malformed JSON', () => {
    writeFileSync(cachePath, '{ not json');
    expect(readCache(cachePath)).toBeNull();
  });

  it('should return null when five_hour has the wrong shape', () => {
    writeFileSync(cachePath, JSON.stringify({ five_hour: 'full' }));
    expect(readCache(cachePath)).toBeNull();
  });

  it('should parse the body and keep the mtime', () => {
    const now = Date.now();
    writeAgedCache(JSON.stringify({ five_hour: { utilization: 42 } }), now, 5_000);

    const entry = readCache(cachePath);
    expect(entry?.body.five_hour?.utilization).toBe(42);
    expect(Math.abs(now - 5_000 - (entry?.mtimeMs ?? 0))).toBeLessThan(1_000);
  });
});

describe('writeCache', () => {
  it('should write the raw body and leave no temp file', () => {
    const body = '{"five_hour":{"utilization":12}}';
    const result = writeCache(cachePath, body);

    expect(result.success).toBe(true);
    expect(readFileSync(cachePath, 'utf-8')).toBe(body);
    expect(existsSync(`${cachePath}.tmp.${process.pid}`)).toBe(false);
  });

  it('should create missing directories', () => {
    const nested = join(tmpDir, 'a', 'b', 'cache');
    expect(writeCache(nested, '{}').success).toBe(true);
    expect(existsSync(nested)).toBe(true);
  });
});

describe('isStale', () => {
  const entry = { body: {}, mtimeMs: 100_000 };

  it('should treat a missing entry as stale', () => {
    expect(isStale(null, 100_000, 30_000)).toBe(true);
  });

  it('should be fresh up to and including the max age', () => {
    expect(isStale(entry, 110_000, 30_000)).toBe(false);
    expect(isStale(entry, 130_000, 30_000)).toBe(false);
  });

  it('should be stale past the max age', () => {
    expect(isStale(entry, 140_000, 30_000)).toBe(true);
  });
});

describe('fiveHourUtilization', () => {
  it('should read five_hour.utilization', () => {
    expect(fiveHourUtilization({ body: { five_hour: { utilization: 61.5 } }, mtimeMs: 0 })).toBe(61.5);
  });

  it('should return null when the window or value is missing', () => {
    expect(fiveHourUtilization(null)).toBeNull();
    expect(fiveHourUtilization({ body: {}, mtimeMs: 0 })).toBeNull();
    expect(fiveHourUtilization({ body: { five_hour: { utilization: null } }, mtimeMs: 0 })).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

describe('readAccessToken', () => {
  let credPath: string;

  beforeEach(() => {
    credPath = join(tmpDir, '.credentials.json');
  });

  it('should read the wrapped token', () => {
    writeFileSync(credPath, JSON.stringify({ claudeAiOauth: { accessToken: 'test-token' } }));
    expect(readAccessToken(credPath)).toBe('test-token');
  });

  it('should read a flat token', () => {
    writeFileSync(credPath, JSON.stringify({ accessToken: 'test-token' }));
    expect(readAccessToken(credPath)).toBe('test-token');
  });

  it('should return null for a missing file', () => {
    expect(readAccessToken(credPath)).toBeNull();
  });

  it('should return null for a "null" token', () => {
    writeFileSync(credPath, JSON.stringify({ claudeAiOauth: { accessToken: 'null' } }));
    expect(readAccessToken(credPath)).toBeNull();
  });

  it('should return null for an expired token', () => {
    writeFileSync(
      credPath,
      JSON.stringify({ claudeAiOauth: { accessToken: 'test-token', expiresAt: 1_000 } })
    );
    expect(readAccessToken(credPath, 2_000)).toBeNull();
    expect(readAccessToken(credPath, 500)).toBe('test-token');
  });
});

// ---------------------------------------------------------------------------
// Cache-aside lookup
// ---------------------------------------------------------------------------

describe('getFiveHourUtilization', () => {
  const maxAgeMs = 30_000;

  it('should reuse a 10 second old cache without fetching', async () => {
    const now = Date.now();
    writeAgedCache(JSON.stringify({ five_hour: { utilization: 33 } }), now, 10_000);
    const fetcher = fakeFetcher({ ok: true, body: '{"five_hour":{"utilization":99}}' });

    const result = await getFiveHourUtilization(
      { cachePath, maxAgeMs },
      { fetchUsage: fetcher, readToken: () => 'test-token', now: () => now }
    );

    expect(result).toBe(33);
    expect(fetcher.calls).toHaveLength(0);
  });

  it('should fetch exactly once when the cache is 40 seconds old', async () => {
    const now = Date.now();
    writeAgedCache(JSON.stringify({ five_hour: { utilization: 33 } }), now, 40_000);
    const fetcher = fakeFetcher({ ok: true, body: '{"five_hour":{"utilization":58}}' });

    const result = await getFiveHourUtilization(
      { cachePath, maxAgeMs },
      { fetchUsage: fetcher, readToken: () => 'test-token', now: () => now }
    );

    expect(result).toBe(58);
    expect(fetcher.calls).toEqual(['test-token']);
    expect(readFileSync(cachePath, 'utf-8')).toBe('{"five_hour":{"utilization":58}}');
  });

  it('should fall back to the stale cache when the fetch fails', async () => {
    const now = Date.now();
    const stale = JSON.stringify({ five_hour: { utilization: 71 } });
    writeAgedCache(stale, now, 120_000);
    const fetcher = fakeFetcher({ ok: false, reason: 'timed out after 3000ms' });

    const result = await getFiveHourUtilization(
      { cachePath, maxAgeMs },
      { fetchUsage: fetcher, readToken: () => 'test-token', now: () => now }
    );

    expect(result).toBe(71);
    expect(fetcher.calls).toHaveLength(1);
    expect(readFileSync(cachePath, 'utf-8')).toBe(stale);
  });

  it('should return null with no cache and a failed fetch', async () => {
    const fetcher = fakeFetcher({ ok: false, reason: 'HTTP 500' });

    const result = await getFiveHourUtilization(
      { cachePath, maxAgeMs },
      { fetchUsage: fetcher, readToken: () => 'test-token' }
    );

    expect(result).toBeNull();
    expect(existsSync(cachePath)).toBe(false);
  });

  it('should skip the fetch without credentials', async () => {
    const fetcher = fakeFetcher({ ok: true, body: '{"five_hour":{"utilization":10}}' });
    const messages: string[] = [];

    const result = await getFiveHourUtilization(
      { cachePath, maxAgeMs },
      { fetchUsage: fetcher, readToken: () => null, debug: (m) => messages.push(m) }
    );

    expect(result).toBeNull();
    expect(fetcher.calls).toHaveLength(0);
    expect(messages).toEqual(['no OAuth access token, using cached usage']);
  });

  it('should treat a malformed cache as a miss and refetch', async () => {
    const now = Date.now();
    writeAgedCache('garbage', now, 1_000);
    const fetcher = fakeFetcher({ ok: true, body: '{"five_hour":{"utilization":5}}' });

    const result = await getFiveHourUtilization(
      { cachePath, maxAgeMs },
      { fetchUsage: fetcher, readToken: () => 'test-token', now: () => now }
    );

    expect(result).toBe(5);
    expect(fetcher.calls).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// HTTP client (in-process server)
// ---------------------------------------------------------------------------

describe('fetchUsage', () => {
  let server: Server;
  let endpoint: string;
  let lastHeaders: Record<string, string | string[] | undefined> = {};
  let respond: (res: ServerResponse) => void;

  beforeEach(async () => {
    server = createServer((req, res) => {
      lastHeaders = req.headers;
      respond(res);
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    endpoint = `http://127.0.0.1:${address.port}/api/oauth/usage`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should return the body on 200 and send the bearer token', async () => {
    respond = (res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('{"five_hour":{"utilization":20}}');
    };

    const result = await fetchUsage('test-token', { endpoint, timeoutMs: 1_000 });

    expect(result).toEqual({ ok: true, body: '{"five_hour":{"utilization":20}}' });
    expect(lastHeaders.authorization).toBe('Bearer test-token');
    expect(lastHeaders['anthropic-beta']).toBe('oauth-2025-04-20');
  });

  it('should fail on non-200 responses', async () => {
    respond = (res) => {
      res.writeHead(401);
      res.end('{"error":"unauthorized"}');
    };

    const result = await fetchUsage('test-token', { endpoint, timeoutMs: 1_000 });
    expect(result).toEqual({ ok: false, reason: 'HTTP 401' });
  });

  it('should fail when the body is not a JSON object', async () => {
    respond = (res) => {
      res.writeHead(200);
      res.end('<html></html>');
    };

    const result = await fetchUsage('test-token', { endpoint, timeoutMs: 1_000 });
    expect(result).toEqual({ ok: false, reason: 'response is not a JSON object' });
  });

  it('should time out when the server never answers', async () => {
    respond = () => {};

    const result = await fetchUsage('test-token', { endpoint, timeoutMs: 50 });
    expect(result).toEqual({ ok: false, reason: 'timed out after 50ms' });
  });

  it('should cut off a server that keeps trickling bytes', async () => {
    respond = (res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      const drip = setInterval(() => res.write(' '), 100);
      res.on('close', () => clearInterval(drip));
    };

    const started = Date.now();
    const result = await fetchUsage('test-token', { endpoint, timeoutMs: 300 });

    expect(result).toEqual({ ok: false, reason: 'timed out after 300ms' });
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('should resolve instead of throwing for an unusable timeout', async () => {
    respond = (res) => {
      res.writeHead(200);
      res.end('{}');
    };

    expect(await fetchUsage('test-token', { endpoint, timeoutMs: -1 })).toEqual({
      ok: false,
      reason: 'invalid timeout: -1',
    });
    expect(await fetchUsage('test-token', { endpoint, timeoutMs: 0 })).toEqual({
      ok: false,
      reason: 'invalid timeout: 0',
    });
  });

  it('should reject an invalid endpoint without a request', async () => {
    const result = await fetchUsage('test-token', { endpoint: 'not a url', timeoutMs: 50 });
    expect(result.ok).toBe(false);
  });
});
