// Subsonic / Navidrome REST client
import { createHash, randomInt } from 'crypto';
import { Agent, request, type Dispatcher } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { createLogger, formatError, type ErrorCode } from '@streamcast/shared';
import {
  albumSchema,
  artistSchema,
  envelopeSchema,
  genreSchema,
  playlistSchema,
  songSchema,
  type Album,
  type Artist,
  type Genre,
  type Playlist,
  type SearchResults,
  type Song,
  type SubsonicBody,
} from './types';

const logger = createLogger('[Subsonic]');

export const API_VERSION = '1.16.1';
const SALT_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const SALT_LENGTH = 12;

export interface SubsonicClientOptions {
  serverUrl: string;
  username: string;
  password: string;
  clientId?: string;  // default 'streamcast'
  timeoutMs?: number;  // default 30000
  /** Shared dispatcher; when omitted the client owns an Agent and closes it */
  dispatcher?: Dispatcher;
}

type Params = Record<string, string | number>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk nested objects by key, yielding undefined on the first missing step
 */
function pick(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * The JSON form of the API collapses one-element lists into a bare object.
 * Items that do not match the schema are dropped.
 */
function parseList<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  const items = Array.isArray(value) ? value : [value];
  const parsed: T[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) {
      parsed.push(result.data);
    } else {
      logger.debug(`Skipping malformed item: ${result.error.errors.map((e) => e.message).join(', ')}`);
    }
  }
  return parsed;
}

export function generateSalt(length: number = SALT_LENGTH): string {
  let salt = '';
  for (let i = 0; i < length; i++) {
    salt += SALT_ALPHABET[randomInt(SALT_ALPHABET.length)];
  }
  return salt;
}

export function tokenFor(password: string, salt: string): string {
  return createHash('md5').update(password + salt).digest('hex');
}

/**
 * Thin wrapper over the Subsonic API. Every call fails soft: problems are
 * logged and come back as an empty list, null or false, with the cause kept
 * in `lastError`.
 */
export class SubsonicClient {
  private readonly serverUrl: string;
  private readonly username: string;
  private readonly password: string;
  private readonly clientId: string;
  private readonly timeoutMs: number;
  private readonly sharedDispatcher: Dispatcher | null;
  private agent: Agent | null = null;
  private lastErrorCode: ErrorCode | null = null;

  constructor(options: SubsonicClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '');
    this.username = options.username;
    this.password = options.password;
    this.clientId = options.clientId ?? 'streamcast';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.sharedDispatcher = options.dispatcher ?? null;
  }

  get lastError(): ErrorCode | null {
    return this.lastErrorCode;
  }

  /**
   * Fresh salted credentials; a new salt is drawn for every request
   */
  authParams(): Record<string, string> {
    const salt = generateSalt();
    return {
      u: this.username,
      t: tokenFor(this.password, salt),
      s: salt,
      v: API_VERSION,
      c: this.clientId,
      f: 'json',
    };
  }

  async ping(): Promise<boolean> {
    return (await this.apiRequest('ping')) !== null;
  }

  async getGenres(): Promise<Genre[]> {
    const body = await this.apiRequest('getGenres');
    return parseList(genreSchema, pick(body, 'genres', 'genre'));
  }

  async getSongsByGenre(genre: string, count: number = 50, offset: number = 0): Promise<Song[]> {
    const body = await this.apiRequest('getSongsByGenre', { genre, count, offset });
    return parseList(songSchema, pick(body, 'songsByGenre', 'song'));
  }

  async getRandomSongs(size: number = 20, genre?: string | null): Promise<Song[]> {
    const params: Params = { size };
    if (genre) {
      params.genre = genre;
    }
    const body = await this.apiRequest('getRandomSongs', params);
    return parseList(songSchema, pick(body, 'randomSongs', 'song'));
  }

  /**
   * All artists, flattened across the alphabetical index
   */
  async getArtists(): Promise<Artist[]> {
    const body = await this.apiRequest('getArtists');
    const indexes = pick(body, 'artists', 'index');
    const list = Array.isArray(indexes) ? indexes : indexes === undefined ? [] : [indexes];
    return list.flatMap((index) => parseList(artistSchema, pick(index, 'artist')));
  }

  async getAlbums(artistId?: string | null): Promise<Album[]> {
    if (artistId) {
      const body = await this.apiRequest('getArtist', { id: artistId });
      return parseList(albumSchema, pick(body, 'artist', 'album'));
    }
    const body = await this.apiRequest('getAlbumList2', { type: 'alphabeticalByName', size: 500 });
    return parseList(albumSchema, pick(body, 'albumList2', 'album'));
  }

  async getAlbumSongs(albumId: string): Promise<Song[]> {
    const body = await this.apiRequest('getAlbum', { id: albumId });
    return parseList(songSchema, pick(body, 'album', 'song'));
  }

  async getSong(songId: string): Promise<Song | null> {
    const body = await this.apiRequest('getSong', { id: songId });
    const [song] = parseList(songSchema, pick(body, 'song'));
    return song ?? null;
  }

  async getPlaylists(): Promise<Playlist[]> {
    const body = await this.apiRequest('getPlaylists');
    return parseList(playlistSchema, pick(body, 'playlists', 'playlist'));
  }

  async getPlaylistSongs(playlistId: string): Promise<Song[]> {
    const body = await this.apiRequest('getPlaylist', { id: playlistId });
    return parseList(songSchema, pick(body, 'playlist', 'entry'));
  }

  async search(query: string): Promise<SearchResults> {
    const body = await this.apiRequest('search3', { query });
    const results = pick(body, 'searchResult3');
    return {
      artists: parseList(artistSchema, pick(results, 'artist')),
      albums: parseList(albumSchema, pick(results, 'album')),
      songs: parseList(songSchema, pick(results, 'song')),
    };
  }

  /**
   * Self-authenticating URL a cast device can fetch directly
   */
  getStreamUrl(songId: string, format: string = 'mp3'): string {
    return this.buildUrl('stream', { id: songId, format });
  }

  getCoverArtUrl(coverId: string, size: number = 300): string {
    return this.buildUrl('getCoverArt', { id: coverId, size });
  }

  async close(): Promise<void> {
    const agent = this.agent;
    this.agent = null;
    if (!agent) {
      return;
    }
    try {
      await agent.close();
    } catch (error) {
      logger.error(`Error closing HTTP agent: ${formatError(error)}`, error);
    }
  }

  private buildUrl(endpoint: string, params: Params = {}): string {
    const query = new URLSearchParams(this.authParams());
    for (const [key, value] of Object.entries(params)) {
      query.set(key, String(value));
    }
    return `${this.serverUrl}/rest/${endpoint}?${query.toString()}`;
  }

  private getDispatcher(): Dispatcher {
    if (this.sharedDispatcher) {
      return this.sharedDispatcher;
    }
    if (!this.agent) {
      this.agent = new Agent({ connect: { timeout: this.timeoutMs } });
    }
    return this.agent;
  }

  /**
   * GET an endpoint and unwrap the envelope. Null on any failure.
   */
  private async apiRequest(endpoint: string, params: Params = {}): Promise<SubsonicBody | null> {
    try {
      const response = await request(this.buildUrl(endpoint, params), {
        method: 'GET',
        dispatcher: this.getDispatcher(),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });

      if (response.statusCode !== 200) {
        await response.body.dump();
        return this.fail('SUBSONIC_HTTP_ERROR', `Subsonic API error: HTTP ${response.statusCode} (${endpoint})`);
      }

      const envelope = envelopeSchema.safeParse(await response.body.json());
      if (!envelope.success) {
        return this.fail('SUBSONIC_INVALID_RESPONSE', `Invalid Subsonic response (${endpoint})`);
      }

      const body = envelope.data['subsonic-response'];
      if (body.status !== 'ok') {
        return this.fail('SUBSONIC_API_ERROR', `Subsonic error: ${body.error?.message ?? 'Unknown'} (${endpoint})`);
      }

      this.lastErrorCode = null;
      return body;
    } catch (error) {
      logger.error(`Subsonic API request failed (${endpoint}): ${formatError(error)}`, error);
      this.lastErrorCode = 'SUBSONIC_HTTP_ERROR';
      return null;
    }
  }

  private fail(code: ErrorCode, message: string): null {
    logger.error(message);
    this.lastErrorCode = code;
    return null;
  }
}
