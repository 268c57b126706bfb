import { Module } from '@nestjs/common';
import { CAST_SINK, LogCastSink } from './cast-sink';

@Module({
  providers: [
    {
      provide: CAST_SINK,
      useClass: LogCastSink,
    },
  ],
  exports: [CAST_SINK],
})
export class CastModule {}
