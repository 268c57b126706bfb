import { Module } from '@nestjs/common';
import { PlayQueue, SubsonicClient, type Song } from '@streamcast/subsonic';
import { PlayerConfigService } from '../config/config.service';
import { StreamModule } from '../stream/stream.module';
import { MusicService, PLAY_QUEUE, SUBSONIC_CLIENT } from './music.service';

@Module({
  imports: [StreamModule],
  providers: [
    MusicService,
    {
      // Null when no Navidrome server is configured
      provide: SUBSONIC_CLIENT,
      inject: [PlayerConfigService],
      useFactory: (config: PlayerConfigService): SubsonicClient | null => {
        const navidrome = config.navidrome;
        if (!navidrome) {
          return null;
        }
        return new SubsonicClient({
          serverUrl: navidrome.url,
          username: navidrome.username,
          password: navidrome.password,
        });
      },
    },
    {
      provide: PLAY_QUEUE,
      useFactory: () => new PlayQueue<Song>(),
    },
  ],
  exports: [MusicService],
})
export class MusicModule {}
