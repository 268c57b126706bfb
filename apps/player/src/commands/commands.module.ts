import { Module } from '@nestjs/common';
import { BrowserModule } from '../browser/browser.module';
import { MusicModule } from '../music/music.module';
import { StreamModule } from '../stream/stream.module';
import { CommandRegistry } from './command-registry';
import { CommandsController } from './commands.controller';

@Module({
  imports: [StreamModule, BrowserModule, MusicModule],
  controllers: [CommandsController],
  providers: [CommandRegistry],
})
export class CommandsModule {}
