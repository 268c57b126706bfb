import type { ErrorCode, ExtractionMethod, ExtractionResult } from '@streamcast/shared';

export function resolved(method: ExtractionMethod, url: string, diagnostic: string): ExtractionResult {
  return { resolvedUrl: url, diagnostic, errorCode: null, method };
}

export function failed(method: ExtractionMethod, errorCode: ErrorCode, diagnostic: string): ExtractionResult {
  return { resolvedUrl: null, diagnostic, errorCode, method };
}
