// Stream page extraction
export * from './fetcher';
export * from './automation';
export * from './extraction';
export * from './metadata';
export * from './coordinator';
export { delay } from './utils/delay';
