// Stream page fetching over undici
import { request } from 'undici';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import type { ErrorCode } from '@streamcast/shared';
import type { PageRequest, PageResponse } from './types';
import { BROWSER_USER_AGENT } from './user-agents';
import { formatError, httpLogger } from '../utils/logger';

export const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_REDIRECTS = 5;

const DECODERS: Record<string, (input: Buffer) => Buffer> = {
  gzip: gunzipSync,
  'x-gzip': gunzipSync,
  deflate: inflateSync,
  br: brotliDecompressSync,
};

const TIMEOUT_CODES = ['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'];
const DNS_CODES = ['ENOTFOUND', 'EAI_AGAIN'];
const TLS_CODES = ['DEPTH_ZERO_SELF_SIGNED_CERT', 'SELF_SIGNED_CERT_IN_CHAIN', 'UNABLE_TO_VERIFY_LEAF_SIGNATURE'];

export interface NetworkFailure {
  errorCode: ErrorCode;
  errorDetail: string;
}

function headerValue(value: string | string[] | undefined): string | null {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value ?? null;
}

/**
 * Undo Content-Encoding. Unknown encodings and corrupt payloads fall back to
 * the raw bytes.
 */
function decodeBody(raw: Buffer, encoding: string | null): string {
  const decoder = encoding ? DECODERS[encoding.trim().toLowerCase()] : undefined;
  if (!decoder) {
    return raw.toString('utf-8');
  }
  try {
    return decoder(raw).toString('utf-8');
  } catch (error) {
    httpLogger.debug(`Could not decode ${encoding} body: ${formatError(error)}`);
    return raw.toString('utf-8');
  }
}

function systemCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return '';
}

/**
 * Map a thrown network error onto the error taxonomy
 */
export function classifyNetworkError(error: unknown, timeoutMs: number): NetworkFailure {
  const code = systemCode(error);
  const message = formatError(error);

  if (TIMEOUT_CODES.includes(code)) {
    return { errorCode: 'FETCH_TIMEOUT', errorDetail: `No response within ${timeoutMs}ms` };
  }
  if (DNS_CODES.includes(code)) {
    return { errorCode: 'FETCH_DNS', errorDetail: `DNS lookup failed: ${message}` };
  }
  if (TLS_CODES.includes(code) || code.startsWith('CERT_') || code.startsWith('ERR_TLS')) {
    return { errorCode: 'FETCH_TLS', errorDetail: `TLS handshake failed: ${message}` };
  }
  return {
    errorCode: 'FETCH_CONNECTION',
    errorDetail: code ? `Connection failed (${code}): ${message}` : `Connection failed: ${message}`,
  };
}

function abortFailure(timedOut: boolean, signal: AbortSignal | undefined, timeoutMs: number): NetworkFailure | null {
  if (timedOut) {
    return { errorCode: 'FETCH_TIMEOUT', errorDetail: `No response within ${timeoutMs}ms` };
  }
  if (signal?.aborted) {
    return { errorCode: 'UNKNOWN', errorDetail: 'Request aborted' };
  }
  return null;
}

function statusError(status: number): ErrorCode | null {
  if (status >= 500) return 'FETCH_HTTP_5XX';
  if (status >= 400) return 'FETCH_HTTP_4XX';
  return null;
}

/**
 * GET a page the way a desktop browser would. Never throws: network faults
 * and error statuses come back as an error code on the response.
 */
export async function fetchPage(req: PageRequest): Promise<PageResponse> {
  const started = Date.now();
  const timeoutMs = req.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const headers: Record<string, string> = {
    'user-agent': req.userAgent ?? BROWSER_USER_AGENT,
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.5',
    'accept-encoding': 'gzip, deflate, br',
  };
  if (req.referer) {
    headers.referer = req.referer;
  }

  // Caps the whole exchange; undici's own timeouts only bound each idle gap
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const abortFromCaller = () => controller.abort();
  if (req.signal?.aborted) {
    controller.abort();
  } else {
    req.signal?.addEventListener('abort', abortFromCaller, { once: true });
  }

  try {
    const response = await request(req.url, {
      method: 'GET',
      headers,
      maxRedirections: req.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      dispatcher: req.dispatcher,
      signal: controller.signal,
    });

    const raw = Buffer.from(await response.body.arrayBuffer());
    const errorCode = statusError(response.statusCode);

    return {
      url: req.url,
      status: response.statusCode,
      contentType: headerValue(response.headers['content-type']),
      body: decodeBody(raw, headerValue(response.headers['content-encoding'])),
      errorCode,
      errorDetail: errorCode ? `HTTP ${response.statusCode}` : null,
      elapsedMs: Date.now() - started,
    };
  } catch (error) {
    const failure = abortFailure(timedOut, req.signal, timeoutMs) ?? classifyNetworkError(error, timeoutMs);
    httpLogger.debug(`${req.url}: ${failure.errorDetail}`);
    return {
      url: req.url,
      status: null,
      contentType: null,
      body: null,
      ...failure,
      elapsedMs: Date.now() - started,
    };
  } finally {
    clearTimeout(timer);
    req.signal?.removeEventListener('abort', abortFromCaller);
  }
}
