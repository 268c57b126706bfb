// Component loggers for the extraction pipeline
import { createLogger } from '@streamcast/shared';

export { createLogger, formatError } from '@streamcast/shared';

export const httpLogger = createLogger('[HTTP]');
export const automationLogger = createLogger('[Automation]');
export const staticLogger = createLogger('[Static]');
export const automatedLogger = createLogger('[Automated]');
export const metadataLogger = createLogger('[Metadata]');
export const coordinatorLogger = createLogger('[Coordinator]');

