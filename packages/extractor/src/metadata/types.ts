// Raw info documents produced by yt-dlp-class extractors
import { z } from 'zod';
import type { CapabilityProbe } from '../automation/types';

export const rawFormatSchema = z
  .object({
    format_id: z.string().nullish(),
    url: z.string().nullish(),
    ext: z.string().nullish(),
    manifest_url: z.string().nullish(),
  })
  .passthrough();

const rawEntrySchema = z
  .object({
    url: z.string().nullish(),
    webpage_url: z.string().nullish(),
  })
  .passthrough();

export const rawVideoInfoSchema = z
  .object({
    _type: z.string().nullish(),
    title: z.string().nullish(),
    duration: z.number().nullish(),
    thumbnail: z.string().nullish(),
    description: z.string().nullish(),
    uploader: z.string().nullish(),
    url: z.string().nullish(),
    webpage_url: z.string().nullish(),
    manifest_url: z.string().nullish(),
    is_live: z.boolean().nullish(),
    // Entries of a playlist may be null when an item failed to extract
    entries: z.array(rawEntrySchema.nullable()).nullish(),
    formats: z.array(rawFormatSchema).nullish(),
  })
  .passthrough();

export type RawFormat = z.infer<typeof rawFormatSchema>;
export type RawVideoInfo = z.infer<typeof rawVideoInfoSchema>;

export interface ExtractInfoOptions {
  /** Format preference, e.g. `best[ext=mp4]/best` */
  format?: string;
  userAgent?: string;
  geoBypass?: boolean;
}

/**
 * Something that turns a page URL into a raw info document without
 * downloading media. Rejects when the URL is not understood.
 */
export interface MetadataSource {
  readonly capability: CapabilityProbe;
  extractInfo(url: string, options: ExtractInfoOptions): Promise<RawVideoInfo>;
}

/**
 * Error raised by a metadata source, carrying the tool's own message
 */
export class MetadataSourceError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null = null,
  ) {
    super(message);
    this.name = 'MetadataSourceError';
  }
}
