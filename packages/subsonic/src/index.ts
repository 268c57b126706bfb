// Subsonic client and play queue
export { SubsonicClient, API_VERSION, generateSalt, tokenFor } from './client';
export type { SubsonicClientOptions } from './client';
export { PlayQueue, shuffled } from './queue';
export type { LoadOptions, RandomSource } from './queue';
export * from './types';
