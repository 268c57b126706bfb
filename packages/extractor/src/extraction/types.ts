import type { ExtractionMethod, ExtractionResult } from '@streamcast/shared';

/**
 * One extraction strategy bound to a single stream target.
 *
 * `extract()` never rejects; failures come back as a result with a null
 * `resolvedUrl`. `close()` releases whatever the strategy holds (browser
 * process, HTTP agent) and is safe to call more than once.
 */
export interface VideoExtractor {
  readonly method: ExtractionMethod;
  extract(): Promise<ExtractionResult>;
  /** Resolved media URL, or null when extraction failed */
  getVideoUrl(): Promise<string | null>;
  close(): Promise<void>;
}
