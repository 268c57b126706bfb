import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { StreamModule } from './stream/stream.module';
import { MusicModule } from './music/music.module';
import { CommandsModule } from './commands/commands.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule,
    StreamModule,
    MusicModule,
    CommandsModule,
  ],
  controllers: [HealthController],
})
export class PlayerModule {}
