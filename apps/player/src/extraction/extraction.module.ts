import { Module } from '@nestjs/common';
import {
  AutomationDriver,
  ExtractionCoordinator,
  PlaywrightLauncher,
  WorkerPool,
  YtDlpSource,
  type BrowserLauncher,
  type MetadataSource,
} from '@streamcast/extractor';
import { PlayerConfigService } from '../config/config.service';

export const BROWSER_LAUNCHER = 'BROWSER_LAUNCHER';
export const METADATA_SOURCE = 'METADATA_SOURCE';

@Module({
  providers: [
    {
      // One pool per process, shared by every metadata extraction
      provide: WorkerPool,
      inject: [PlayerConfigService],
      useFactory: (config: PlayerConfigService) => new WorkerPool(config.metadataWorkers),
    },
    {
      provide: BROWSER_LAUNCHER,
      inject: [PlayerConfigService],
      useFactory: (config: PlayerConfigService): BrowserLauncher =>
        new PlaywrightLauncher({ executablePath: config.browserExecutablePath }),
    },
    {
      provide: METADATA_SOURCE,
      inject: [PlayerConfigService],
      useFactory: (config: PlayerConfigService): Promise<MetadataSource> =>
        YtDlpSource.create({ binary: config.ytdlpBinary }),
    },
    {
      provide: ExtractionCoordinator,
      inject: [BROWSER_LAUNCHER, METADATA_SOURCE, WorkerPool],
      useFactory: (launcher: BrowserLauncher, metadataSource: MetadataSource, pool: WorkerPool) =>
        new ExtractionCoordinator({ launcher, metadataSource, pool }),
    },
    {
      // Long-lived session for the browser-control commands
      provide: AutomationDriver,
      inject: [BROWSER_LAUNCHER],
      useFactory: (launcher: BrowserLauncher) => new AutomationDriver({ launcher }),
    },
  ],
  exports: [ExtractionCoordinator, AutomationDriver],
})
export class ExtractionModule {}
