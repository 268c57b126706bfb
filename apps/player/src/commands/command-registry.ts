import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { z } from 'zod';
import { StreamPlayerService } from '../stream/stream-player.service';
import { BrowserControlService } from '../browser/browser-control.service';
import { MusicService } from '../music/music.service';

export interface CommandInfo {
  name: string;
  description: string;
}

interface RegisteredCommand {
  description: string;
  run(args: unknown): Promise<unknown>;
}

/**
 * Bind a handler to the schema of its arguments; the handler only ever sees
 * parsed input
 */
function defineCommand<S extends z.ZodTypeAny>(
  description: string,
  schema: S,
  handler: (args: z.infer<S>) => unknown,
): RegisteredCommand {
  return {
    description,
    async run(args: unknown) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const errors = parsed.error.errors.map(err =>
          err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message
        );
        throw new BadRequestException(errors);
      }
      return handler(parsed.data);
    },
  };
}

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL');
const selector = z.string().min(1);
const timeoutMs = z.number().int().positive().max(300000).optional();
const castTarget = z.string().min(1).optional();
const noArgs = z.object({}).strict();

@Injectable()
export class CommandRegistry {
  private readonly logger = new Logger(CommandRegistry.name);
  private readonly commands: Map<string, RegisteredCommand>;

  constructor(
    private readonly player: StreamPlayerService,
    private readonly browser: BrowserControlService,
    private readonly music: MusicService,
  ) {
    this.commands = new Map(Object.entries(this.buildTable()));
  }

  list(): CommandInfo[] {
    return [...this.commands.entries()].map(([name, command]) => ({
      name,
      description: command.description,
    }));
  }

  async dispatch(name: string, args: unknown = {}): Promise<unknown> {
    const command = this.commands.get(name);
    if (!command) {
      throw new NotFoundException(`Unknown command: ${name}`);
    }
    this.logger.log(`Running ${name}`);
    return command.run(args ?? {});
  }

  private buildTable(): Record<string, RegisteredCommand> {
    const { player, browser, music } = this;

    return {
      // Playback
      play_stream: defineCommand(
        'Extract the video URL from a stream page and cast it',
        z.object({ url: httpUrl.optional() }).strict(),
        ({ url }) => player.playStream(url),
      ),
      stop_stream: defineCommand('Stop playback', noArgs, () => player.stopStream()),
      set_stream_url: defineCommand(
        'Change the default stream page',
        z.object({ url: httpUrl }).strict(),
        ({ url }) => player.setStreamUrl(url),
      ),
      set_tv: defineCommand(
        'Change the cast device',
        z.object({ target: z.string().min(1) }).strict(),
        ({ target }) => player.setCastTarget(target),
      ),

      // Browser control
      navigate_url: defineCommand(
        'Load a page in the controlled browser',
        z.object({ url: httpUrl }).strict(),
        async ({ url }) => ({ success: await browser.navigate(url) }),
      ),
      click_element: defineCommand(
        'Click the element matching a CSS selector',
        z.object({ selector, timeoutMs }).strict(),
        async (args) => ({ success: await browser.clickElement(args.selector, args.timeoutMs) }),
      ),
      scroll_page: defineCommand(
        'Scroll the page up, down, to the top or to the bottom',
        z.object({ direction: z.string().default('down'), amount: z.number().int().default(500) }).strict(),
        async ({ direction, amount }) => ({ success: await browser.scrollPage(direction, amount) }),
      ),
      execute_script: defineCommand(
        'Run a script in the page and return its result',
        z.object({ script: z.string().min(1) }).strict(),
        async ({ script }) => ({ result: await browser.executeScript(script) }),
      ),
      wait_for_element: defineCommand(
        'Wait for an element to appear',
        z.object({ selector, timeoutMs }).strict(),
        async (args) => ({ success: await browser.waitForElement(args.selector, args.timeoutMs) }),
      ),
      get_page_source: defineCommand('Return the rendered page source', noArgs, async () => ({
        pageSource: await browser.getPageSource(),
      })),
      get_elements: defineCommand(
        'Describe every element matching a CSS selector',
        z.object({ selector }).strict(),
        async (args) => ({ elements: await browser.getElements(args.selector) }),
      ),
      take_screenshot: defineCommand(
        'Save a full-page screenshot',
        z.object({ path: z.string().min(1) }).strict(),
        async ({ path }) => ({ success: await browser.takeScreenshot(path) }),
      ),

      // Music
      get_genres: defineCommand('List genres on the music server', noArgs, async () => ({
        genres: await music.getGenres(),
      })),
      play_genre: defineCommand(
        'Queue songs from a genre',
        z.object({ genre: z.string().min(1), shuffle: z.boolean().default(true), castTarget }).strict(),
        ({ genre, ...options }) => music.playGenre(genre, options),
      ),
      play_random: defineCommand(
        'Queue random songs, optionally from one genre',
        z.object({ genre: z.string().min(1).optional(), count: z.number().int().min(1).max(500).default(20), castTarget }).strict(),
        ({ genre, count, castTarget: target }) => music.playRandom(count, genre, { castTarget: target }),
      ),
      play_song: defineCommand(
        'Play a single song',
        z.object({ songId: z.string().min(1), castTarget }).strict(),
        ({ songId, castTarget: target }) => music.playSong(songId, { castTarget: target }),
      ),
      search_music: defineCommand(
        'Search artists, albums and songs',
        z.object({ query: z.string().min(1) }).strict(),
        ({ query }) => music.search(query),
      ),
      get_playlists: defineCommand('List playlists on the music server', noArgs, async () => ({
        playlists: await music.getPlaylists(),
      })),
      play_playlist: defineCommand(
        'Queue a playlist',
        z.object({ playlistId: z.string().min(1), shuffle: z.boolean().default(false), castTarget }).strict(),
        ({ playlistId, ...options }) => music.playPlaylist(playlistId, options),
      ),
      next_track: defineCommand('Skip to the next song in the queue', noArgs, () => music.nextTrack()),
      previous_track: defineCommand('Go back to the previous song', noArgs, () => music.previousTrack()),
      set_shuffle: defineCommand(
        'Turn queue shuffle on or off',
        z.object({ shuffle: z.boolean() }).strict(),
        ({ shuffle }) => music.setShuffle(shuffle),
      ),
      set_repeat: defineCommand(
        'Set the queue repeat mode',
        z.object({ mode: z.enum(['off', 'all', 'one']) }).strict(),
        ({ mode }) => music.setRepeat(mode),
      ),
    };
  }
}
