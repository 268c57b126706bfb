import { Module } from '@nestjs/common';
import { ExtractionModule } from '../extraction/extraction.module';
import { BrowserControlService } from './browser-control.service';

@Module({
  imports: [ExtractionModule],
  providers: [BrowserControlService],
  exports: [BrowserControlService],
})
export class BrowserModule {}
