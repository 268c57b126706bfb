// Browser automation exports
export { AutomationDriver, classifyAutomationError, DEFAULT_ELEMENT_TIMEOUT_MS } from './driver';
export type { AutomationDriverOptions } from './driver';
export { PlaywrightLauncher } from './playwright';
export type { PlaywrightLauncherOptions } from './playwright';
export { toCssSelector } from './selectors';
export type { BrowserLauncher, BrowserSession, CapabilityProbe, LaunchOptions, WaitState } from './types';
