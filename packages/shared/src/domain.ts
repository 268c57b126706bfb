// Domain types for Streamcast - stream page extraction and casting

export type ExtractionMethod = "static" | "automated" | "metadata";

export const EXTRACTION_METHODS: readonly ExtractionMethod[] = ["static", "automated", "metadata"];

/**
 * Legacy method names accepted in configuration
 */
export const EXTRACTION_METHOD_ALIASES: Readonly<Record<string, ExtractionMethod>> = {
  aiohttp: "static",
  selenium: "automated",
  "yt-dlp": "metadata",
};

export type ErrorCode =
  // Network errors
  | "FETCH_TIMEOUT" | "FETCH_DNS" | "FETCH_CONNECTION" | "FETCH_TLS" | "FETCH_HTTP_4XX" | "FETCH_HTTP_5XX"
  // Capability
  | "CAPABILITY_UNAVAILABLE"
  // Automation errors
  | "AUTOMATION_LAUNCH_FAILED" | "AUTOMATION_NAVIGATION_FAILED" | "AUTOMATION_TIMEOUT" | "AUTOMATION_CRASH"
  // Extraction errors
  | "EXTRACT_NO_MATCH" | "EXTRACT_PARSE_ERROR" | "EXTRACTION_DEADLINE_EXCEEDED"
  // Metadata errors
  | "METADATA_UNSUPPORTED_URL" | "METADATA_EXTRACTION_FAILED"
  // Subsonic errors
  | "SUBSONIC_HTTP_ERROR" | "SUBSONIC_API_ERROR" | "SUBSONIC_INVALID_RESPONSE"
  // Cast errors
  | "CAST_FAILED"
  // Unknown
  | "UNKNOWN";

/**
 * A stream page plus the selectors the automated extractor works with.
 * Selectors starting with `#` match an element id, `.` a class name,
 * anything else is a CSS selector.
 */
export interface StreamTarget {
  readonly url: string;
  readonly popupSelectors: readonly string[];
  readonly videoSelectors: readonly string[];
}

export interface ExtractionResult {
  resolvedUrl: string | null;
  diagnostic: string;
  errorCode: ErrorCode | null;
  method: ExtractionMethod;
}

export interface VideoInfo {
  title: string;
  duration: number | null;
  thumbnail: string | null;
  description: string;
  uploader: string;
  url: string | null;
  isLive: boolean;
  formatCount: number;
}

export interface ElementInfo {
  text: string;
  tag: string;
  href: string | null;
  src: string | null;
  class: string | null;
  id: string | null;
}

export type ScrollDirection = "down" | "up" | "top" | "bottom";

export type MediaKind = "video" | "audio";

// Hand-off to the cast device
export interface CastRequest {
  url: string;
  mimeType: string;
  title?: string;
  target?: string | null;
}

export type PlayerState = "idle" | "playing";

export type RepeatMode = "off" | "all" | "one";

// Overlay close buttons tried, in order, before looking for the player
export const DEFAULT_POPUP_SELECTORS: readonly string[] = [
  "button[class*='close']",
  "div[class*='popup'] button",
  "a[class*='close']",
  "[id*='close']",
  ".modal-close",
  ".popup-close",
  "[aria-label*='close' i]",
];

export const DEFAULT_VIDEO_SELECTORS: readonly string[] = [
  "video",
  "iframe[src*='player']",
  "iframe[src*='embed']",
  "[class*='player']",
  "[id*='player']",
];
