import { Inject, Injectable, Logger, OnModuleDestroy, ServiceUnavailableException } from '@nestjs/common';
import type { RepeatMode } from '@streamcast/shared';
import { inferMimeType } from '@streamcast/extractor';
import {
  PlayQueue,
  SubsonicClient,
  type Genre,
  type Playlist,
  type SearchResults,
  type Song,
} from '@streamcast/subsonic';
import { StreamPlayerService } from '../stream/stream-player.service';

export const SUBSONIC_CLIENT = 'SUBSONIC_CLIENT';
export const PLAY_QUEUE = 'PLAY_QUEUE';

export interface QueueStatus {
  current: Song | null;
  position: number;
  length: number;
  shuffle: boolean;
  repeat: RepeatMode;
}

export interface PlayOptions {
  shuffle?: boolean;
  castTarget?: string | null;
}

function describeSong(song: Song): string {
  return song.artist ? `${song.artist} - ${song.title}` : song.title;
}

@Injectable()
export class MusicService implements OnModuleDestroy {
  private readonly logger = new Logger(MusicService.name);
  private castTarget: string | null = null;

  constructor(
    @Inject(SUBSONIC_CLIENT) private readonly client: SubsonicClient | null,
    @Inject(PLAY_QUEUE) private readonly queue: PlayQueue<Song>,
    private readonly player: StreamPlayerService,
  ) {}

  async onModuleDestroy() {
    await this.client?.close();
  }

  get isConfigured(): boolean {
    return this.client !== null;
  }

  getQueueStatus(): QueueStatus {
    return {
      current: this.queue.current,
      position: this.queue.position,
      length: this.queue.length,
      shuffle: this.queue.shuffle,
      repeat: this.queue.repeat,
    };
  }

  async getGenres(): Promise<Genre[]> {
    return this.requireClient().getGenres();
  }

  async getPlaylists(): Promise<Playlist[]> {
    return this.requireClient().getPlaylists();
  }

  async search(query: string): Promise<SearchResults> {
    return this.requireClient().search(query);
  }

  async playGenre(genre: string, options: PlayOptions = {}): Promise<QueueStatus> {
    const songs = await this.requireClient().getSongsByGenre(genre);
    this.logger.log(`Queueing ${songs.length} songs from genre ${genre}`);
    return this.playQueue(songs, { shuffle: true, ...options });
  }

  async playRandom(count: number, genre?: string | null, options: PlayOptions = {}): Promise<QueueStatus> {
    const songs = await this.requireClient().getRandomSongs(count, genre);
    return this.playQueue(songs, options);
  }

  async playPlaylist(playlistId: string, options: PlayOptions = {}): Promise<QueueStatus> {
    const songs = await this.requireClient().getPlaylistSongs(playlistId);
    return this.playQueue(songs, options);
  }

  /**
   * Play one song by id; it replaces the queue
   */
  async playSong(songId: string, options: PlayOptions = {}): Promise<QueueStatus> {
    const song = (await this.requireClient().getSong(songId)) ?? { id: songId, title: 'Unknown' };
    return this.playQueue([song], { ...options, shuffle: false });
  }

  async nextTrack(): Promise<QueueStatus> {
    const song = this.queue.next();
    if (!song) {
      this.logger.log('Reached the end of the queue');
      await this.player.stopStream();
      return this.getQueueStatus();
    }
    await this.castSong(song);
    return this.getQueueStatus();
  }

  async previousTrack(): Promise<QueueStatus> {
    const song = this.queue.previous();
    if (song) {
      await this.castSong(song);
    }
    return this.getQueueStatus();
  }

  setShuffle(on: boolean): QueueStatus {
    this.queue.setShuffle(on);
    return this.getQueueStatus();
  }

  setRepeat(mode: RepeatMode): QueueStatus {
    this.queue.setRepeat(mode);
    return this.getQueueStatus();
  }

  private async playQueue(songs: Song[], options: PlayOptions): Promise<QueueStatus> {
    this.castTarget = options.castTarget ?? null;
    const first = this.queue.load(songs, { shuffle: options.shuffle });
    if (!first) {
      this.logger.warn('No songs to play');
      return this.getQueueStatus();
    }
    await this.castSong(first);
    return this.getQueueStatus();
  }

  private async castSong(song: Song): Promise<boolean> {
    const url = this.requireClient().getStreamUrl(song.id);
    this.logger.log(`Playing ${describeSong(song)}`);
    return this.player.cast(
      { url, mimeType: inferMimeType(url, 'audio'), title: describeSong(song) },
      this.castTarget,
    );
  }

  private requireClient(): SubsonicClient {
    if (!this.client) {
      throw new ServiceUnavailableException('Music server is not configured');
    }
    return this.client;
  }
}
