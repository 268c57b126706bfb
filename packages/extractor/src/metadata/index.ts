// Metadata extraction exports
export { MetadataExtractor, PREFERRED_FORMAT, selectVideoUrl, toVideoInfo } from './metadata-extractor';
export type { MetadataExtractorOptions } from './metadata-extractor';
export { WorkerPool } from './worker-pool';
export { YtDlpSource, CommandError, parseYtDlpError, runCommand } from './ytdlp';
export type { CommandOptions, CommandOutput, CommandRunner, YtDlpOptions } from './ytdlp';
export { MetadataSourceError, rawVideoInfoSchema } from './types';
export type { ExtractInfoOptions, MetadataSource, RawFormat, RawVideoInfo } from './types';
