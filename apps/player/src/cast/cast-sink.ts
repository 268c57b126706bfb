import { Injectable, Logger } from '@nestjs/common';
import type { CastRequest } from '@streamcast/shared';

export const CAST_SINK = 'CAST_SINK';

/**
 * Device that plays a resolved media URL. Discovery and device protocols
 * live behind this interface.
 */
export interface CastSink {
  play(request: CastRequest): Promise<void>;
  stop(target: string | null): Promise<void>;
}

/**
 * Default sink: records the hand-off so the URL can be played manually
 */
@Injectable()
export class LogCastSink implements CastSink {
  private readonly logger = new Logger(LogCastSink.name);
  private current: CastRequest | null = null;

  get nowPlaying(): CastRequest | null {
    return this.current;
  }

  async play(request: CastRequest): Promise<void> {
    this.current = request;
    const title = request.title ? ` "${request.title}"` : '';
    this.logger.log(`Cast${title} to ${request.target ?? 'default device'}: ${request.url} (${request.mimeType})`);
  }

  async stop(target: string | null): Promise<void> {
    if (this.current) {
      this.logger.log(`Stopped playback on ${target ?? 'default device'}`);
    }
    this.current = null;
  }
}
