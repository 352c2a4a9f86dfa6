import { Readable } from 'node:stream';
import { setTimeout as sleep } from 'node:timers/promises';
import { SourceFetchError, errorCode } from '../core/errors.js';
import { parseLine, type ParsedLine, type ParsedRule } from './parse.js';
import type { SourceConfig } from './types.js';

export type FetchOptions = {
  timeoutMs: number;
  maxBytes: number;
  retries: number;
  retryBaseMs: number;
};

const USER_AGENT = 'hushdns/0.1';

async function* downloadLines(url: string, timeoutMs: number, maxBytes: number): AsyncGenerator<string> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  try {
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'GET',
        headers: { 'user-agent': USER_AGENT },
        signal: ac.signal
      });
    } catch (e) {
      if (ac.signal.aborted) throw new Error('FETCH_TIMEOUT');
      throw e;
    }
    if (!res.ok) throw new Error(`HTTP_${res.status}`);
    if (!res.body) return;

    const decoder = new TextDecoder('utf-8');
    let buffered = '';
    let seenBytes = 0;

    try {
      // Stream to keep memory bounded on multi-megabyte lists.
      for await (const chunk of Readable.fromWeb(res.body)) {
        const buf: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        seenBytes += buf.length;
        if (seenBytes > maxBytes) throw new Error('TOO_LARGE');

        buffered += decoder.decode(buf, { stream: true });
        let idx: number;
        while ((idx = buffered.indexOf('\n')) >= 0) {
          let line = buffered.slice(0, idx);
          buffered = buffered.slice(idx + 1);
          if (line.endsWith('\r')) line = line.slice(0, -1);
          yield line;
        }
      }
    } catch (e) {
      if (ac.signal.aborted) throw new Error('FETCH_TIMEOUT');
      throw e;
    }

    buffered += decoder.decode();
    if (buffered.length) yield buffered.endsWith('\r') ? buffered.slice(0, -1) : buffered;
  } finally {
    clearTimeout(timer);
  }
}

function isRetryable(err: unknown): boolean {
  const code = errorCode(err);
  if (code === 'TOO_LARGE') return false;
  const m = /^HTTP_(\d{3})$/.exec(code);
  if (m) {
    const status = Number(m[1]);
    return status >= 500 || status === 429;
  }
  return true;
}

async function fetchOnce(source: SourceConfig, opts: FetchOptions): Promise<ParsedLine> {
  const rules: ParsedRule[] = [];
  let invalid = 0;
  for await (const line of downloadLines(source.url, opts.timeoutMs, opts.maxBytes)) {
    const parsed = parseLine(source.format, line);
    for (const r of parsed.rules) rules.push(r);
    invalid += parsed.invalid;
  }
  return { rules, invalid };
}

/**
 * Downloads and parses one source. Transient failures (network, timeouts, 5xx)
 * are retried with exponential backoff; the final failure is a SourceFetchError
 * carrying only a short code.
 */
export async function fetchSourceRules(source: SourceConfig, opts: FetchOptions): Promise<ParsedLine> {
  let attempt = 0;
  for (;;) {
    try {
      return await fetchOnce(source, opts);
    } catch (e) {
      if (attempt >= opts.retries || !isRetryable(e)) {
        throw new SourceFetchError(source.name, errorCode(e), { cause: e });
      }
      await sleep(opts.retryBaseMs * 2 ** attempt);
      attempt++;
    }
  }
}
