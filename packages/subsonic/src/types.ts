// Subsonic API response shapes
import { z } from 'zod';

// Navidrome sends string ids, older servers numbers
const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const songSchema = z
  .object({
    id: idSchema,
    title: z.string().default('Unknown'),
    artist: z.string().optional(),
    album: z.string().optional(),
    albumId: idSchema.optional(),
    genre: z.string().optional(),
    duration: z.number().optional(),
    track: z.number().optional(),
    year: z.number().optional(),
    coverArt: z.string().optional(),
    suffix: z.string().optional(),
    contentType: z.string().optional(),
  })
  .passthrough();

export const genreSchema = z
  .object({
    value: z.string(),
    songCount: z.number().optional(),
    albumCount: z.number().optional(),
  })
  .passthrough();

export const artistSchema = z
  .object({
    id: idSchema,
    name: z.string(),
    albumCount: z.number().optional(),
    coverArt: z.string().optional(),
  })
  .passthrough();

export const albumSchema = z
  .object({
    id: idSchema,
    name: z.string(),
    artist: z.string().optional(),
    artistId: idSchema.optional(),
    songCount: z.number().optional(),
    year: z.number().optional(),
    coverArt: z.string().optional(),
  })
  .passthrough();

export const playlistSchema = z
  .object({
    id: idSchema,
    name: z.string(),
    songCount: z.number().optional(),
    duration: z.number().optional(),
    owner: z.string().optional(),
  })
  .passthrough();

/**
 * Every JSON response is wrapped as `{"subsonic-response": {...}}`
 */
export const envelopeSchema = z.object({
  'subsonic-response': z
    .object({
      status: z.string(),
      version: z.string().optional(),
      error: z
        .object({
          code: z.number().optional(),
          message: z.string().optional(),
        })
        .optional(),
    })
    .passthrough(),
});

export type Song = z.infer<typeof songSchema>;
export type Genre = z.infer<typeof genreSchema>;
export type Artist = z.infer<typeof artistSchema>;
export type Album = z.infer<typeof albumSchema>;
export type Playlist = z.infer<typeof playlistSchema>;
export type SubsonicBody = z.infer<typeof envelopeSchema>['subsonic-response'];

export interface SearchResults {
  artists: Artist[];
  albums: Album[];
  songs: Song[];
}
