export { ExtractionCoordinator, normalizeExtractionMethod } from './coordinator';
export type { CapabilityReport, CoordinatorDeps, ExtractOptions } from './coordinator';
export { inferMimeType } from './mime';
