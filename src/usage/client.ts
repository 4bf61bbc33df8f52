/**
 * Usage API client
 *
 * GET <endpoint> with the OAuth bearer token and a short timeout.
 * Resolves, never rejects: a timeout, a network error, a non-200 status or
 * a body that is not a JSON object all come back as { ok: false }.
 */

import http from 'http';
import https from 'https';
import { describeError } from '../shared/debug.js';

export type FetchResult =
  | { ok: true; body: string }
  | { ok: false; reason: string };

/** Capability used by the cache-aside lookup; swapped for a fake in tests. */
export type UsageFetcher = (accessToken: string) => Promise<FetchResult>;

export interface UsageClientOptions {
  endpoint: string;
  timeoutMs: number;
}

function isJsonObject(body: string): boolean {
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
  } catch {
    return false;
  }
}

/**
 * Fetch the raw usage body. timeoutMs bounds the whole request, not just
 * socket inactivity, so a server that trickles bytes is still cut off.
 */
export function fetchUsage(
  accessToken: string,
  { endpoint, timeoutMs }: UsageClientOptions
): Promise<FetchResult> {
  return new Promise((resolve) => {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch (err) {
      resolve({ ok: false, reason: `invalid endpoint: ${describeError(err)}` });
      return;
    }
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      resolve({ ok: false, reason: `unsupported protocol ${url.protocol}` });
      return;
    }
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      resolve({ ok: false, reason: `invalid timeout: ${timeoutMs}` });
      return;
    }

    let req: http.ClientRequest | undefined;
    let settled = false;
    const deadline = setTimeout(() => {
      settle({ ok: false, reason: `timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    function settle(result: FetchResult): void {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      if (!result.ok) req?.destroy();
      resolve(result);
    }

    const options: https.RequestOptions = {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
        'anthropic-beta': 'oauth-2025-04-20',
      },
    };

    const onResponse = (res: http.IncomingMessage): void => {
      let data = '';
      res.setEncoding('utf-8');
      res.on('data', (chunk: string) => {
        data += chunk;
      });
      res.on('end', () => {
        if (res.statusCode !== 200) {
          settle({ ok: false, reason: `HTTP ${res.statusCode ?? 'unknown'}` });
        } else if (!isJsonObject(data)) {
          settle({ ok: false, reason: 'response is not a JSON object' });
        } else {
          settle({ ok: true, body: data });
        }
      });
      res.on('error', (err) => settle({ ok: false, reason: describeError(err) }));
    };

    try {
      // Plain http only for local endpoints such as a proxy.
      req =
        url.protocol === 'http:'
          ? http.request(url, options, onResponse)
          : https.request(url, options, onResponse);
    } catch (err) {
      settle({ ok: false, reason: describeError(err) });
      return;
    }

    req.on('error', (err) => settle({ ok: false, reason: describeError(err) }));
    req.end();
  });
}

/**
 * Bind endpoint and timeout into a UsageFetcher.
 */
export function createUsageFetcher(options: UsageClientOptions): UsageFetcher {
  return (accessToken) => fetchUsage(accessToken, options);
}
