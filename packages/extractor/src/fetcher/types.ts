// Page fetch types
import type { Dispatcher } from 'undici';
import type { ErrorCode } from '@streamcast/shared';

export interface PageRequest {
  url: string;
  timeoutMs?: number;  // default 30000
  userAgent?: string;
  referer?: string;
  maxRedirects?: number;  // default 5, 0 disables
  /** Connection pool to use; undici's global dispatcher when omitted */
  dispatcher?: Dispatcher;
  /** Aborts the request from outside */
  signal?: AbortSignal;
}

/**
 * Outcome of a page fetch. `status` is null when no response arrived;
 * `body` holds the decoded text whenever one did, error pages included.
 */
export interface PageResponse {
  url: string;
  status: number | null;
  contentType: string | null;
  body: string | null;
  errorCode: ErrorCode | null;
  errorDetail: string | null;
  elapsedMs: number;
}
