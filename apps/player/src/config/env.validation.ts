import { z } from 'zod';
import { normalizeExtractionMethod } from '@streamcast/extractor';

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL');

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000'),
  API_PREFIX: z.string().default('api'),

  // Stream extraction
  STREAM_URL: httpUrl.optional(),
  EXTRACTION_METHOD: z
    .string()
    .default('metadata')
    .refine((value) => normalizeExtractionMethod(value) !== null, 'must be one of static, automated, metadata'),
  POPUP_SELECTORS: z.string().optional(),
  VIDEO_SELECTORS: z.string().optional(),
  EXTRACTION_TIMEOUT_MS: z.string().regex(/^\d+$/, 'must be a whole number of milliseconds').default('0'),

  // External tools
  BROWSER_EXECUTABLE_PATH: z.string().optional(),
  YTDLP_BINARY: z.string().default('yt-dlp'),
  METADATA_WORKERS: z.string().regex(/^[1-9]\d*$/, 'must be a positive integer').default('2'),

  // Navidrome / Subsonic (optional)
  NAVIDROME_URL: httpUrl.optional(),
  NAVIDROME_USERNAME: z.string().optional(),
  NAVIDROME_PASSWORD: z.string().optional(),

  // Cast device
  CAST_TARGET: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
