import { Module } from '@nestjs/common';
import { CastModule } from '../cast/cast.module';
import { ExtractionModule } from '../extraction/extraction.module';
import { StreamPlayerService } from './stream-player.service';

@Module({
  imports: [ExtractionModule, CastModule],
  providers: [StreamPlayerService],
  exports: [StreamPlayerService],
})
export class StreamModule {}
