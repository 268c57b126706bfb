// Fetcher exports
export { fetchPage, classifyNetworkError, DEFAULT_TIMEOUT_MS } from './http';
export type { NetworkFailure } from './http';
export { BROWSER_USER_AGENT, DEFAULT_USER_AGENT } from './user-agents';
export type { PageRequest, PageResponse } from './types';
