// Page extraction exports
export { StaticPageExtractor, findMediaReference } from './static';
export type { MediaReference, MediaReferenceSource, StaticExtractorOptions } from './static';
export { AutomatedPageExtractor } from './automated';
export type { AutomatedExtractorOptions } from './automated';
export {
  ASSIGNMENT_PATTERN,
  M3U8_PATTERN,
  PLAYER_IFRAME_HINTS,
  findAssignedMediaUrl,
  findM3u8Url,
  isPlayerIframe,
  resolveMediaUrl,
} from './patterns';
export type { VideoExtractor } from './types';
