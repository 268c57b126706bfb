/**
 * Error taxonomy: what each failure code means for someone trying to play a
 * stream, and what they can do about it.
 */

import type { ErrorCode } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  severity: 'info' | 'warning' | 'error' | 'critical';
  retryable: boolean;
}

export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Network errors
  FETCH_TIMEOUT: {
    title: 'Request Timeout',
    description: 'The stream page took too long to respond.',
    recommendation: 'Try again later or switch to another extraction method.',
    severity: 'warning',
    retryable: true,
  },
  FETCH_DNS: {
    title: 'DNS Error',
    description: 'Could not resolve the stream page domain.',
    recommendation: 'Check if the URL is correct and the website exists.',
    severity: 'error',
    retryable: true,
  },
  FETCH_CONNECTION: {
    title: 'Connection Failed',
    description: 'Could not connect to the website.',
    recommendation: 'The website may be down or blocking connections.',
    severity: 'warning',
    retryable: true,
  },
  FETCH_TLS: {
    title: 'SSL/TLS Error',
    description: 'Secure connection could not be established.',
    recommendation: 'The website may have an invalid SSL certificate.',
    severity: 'error',
    retryable: false,
  },
  FETCH_HTTP_4XX: {
    title: 'Client Error',
    description: 'The website returned an error (4xx status).',
    recommendation: 'Check if the URL is correct. Pages behind a login are not supported.',
    severity: 'warning',
    retryable: false,
  },
  FETCH_HTTP_5XX: {
    title: 'Server Error',
    description: 'The website is experiencing issues (5xx status).',
    recommendation: 'The website server may be overloaded. Try again later.',
    severity: 'warning',
    retryable: true,
  },

  // Capability
  CAPABILITY_UNAVAILABLE: {
    title: 'Capability Unavailable',
    description: 'A required external tool (headless browser or yt-dlp) is not installed.',
    recommendation: 'Install the tool or choose another extraction method.',
    severity: 'error',
    retryable: false,
  },

  // Automation errors
  AUTOMATION_LAUNCH_FAILED: {
    title: 'Browser Launch Failed',
    description: 'The headless browser process could not be started.',
    recommendation: 'Check the browser executable path and sandbox settings.',
    severity: 'error',
    retryable: true,
  },
  AUTOMATION_NAVIGATION_FAILED: {
    title: 'Navigation Failed',
    description: 'The headless browser could not load the stream page.',
    recommendation: 'Check the URL or try the static extraction method.',
    severity: 'warning',
    retryable: true,
  },
  AUTOMATION_TIMEOUT: {
    title: 'Automation Timeout',
    description: 'An element did not appear or become clickable in time.',
    recommendation: 'The page may load slowly. Review the configured selectors.',
    severity: 'info',
    retryable: true,
  },
  AUTOMATION_CRASH: {
    title: 'Browser Crashed',
    description: 'The headless browser stopped responding.',
    recommendation: 'This is usually temporary. Try again.',
    severity: 'error',
    retryable: true,
  },

  // Extraction errors
  EXTRACT_NO_MATCH: {
    title: 'No Video Found',
    description: 'The page loaded but no recognizable media reference was found.',
    recommendation: 'Try another extraction method or adjust the video selectors.',
    severity: 'warning',
    retryable: false,
  },
  EXTRACT_PARSE_ERROR: {
    title: 'Parse Error',
    description: 'The page content could not be parsed.',
    recommendation: 'The page may not be HTML. Check the stream URL.',
    severity: 'warning',
    retryable: false,
  },
  EXTRACTION_DEADLINE_EXCEEDED: {
    title: 'Extraction Timed Out',
    description: 'Extraction did not finish before the configured deadline.',
    recommendation: 'Raise EXTRACTION_TIMEOUT_MS or use a cheaper extraction method.',
    severity: 'warning',
    retryable: true,
  },

  // Metadata errors
  METADATA_UNSUPPORTED_URL: {
    title: 'Unsupported URL',
    description: 'The metadata extractor does not recognize this page as a video.',
    recommendation: 'This may be a homepage or listing. Navigate to a specific video first.',
    severity: 'warning',
    retryable: false,
  },
  METADATA_EXTRACTION_FAILED: {
    title: 'Metadata Extraction Failed',
    description: 'The metadata extractor reported an error.',
    recommendation: 'Update yt-dlp or try another extraction method.',
    severity: 'warning',
    retryable: true,
  },

  // Subsonic errors
  SUBSONIC_HTTP_ERROR: {
    title: 'Music Server Unreachable',
    description: 'The Subsonic server returned a non-success HTTP status.',
    recommendation: 'Check the Navidrome URL and that the server is running.',
    severity: 'warning',
    retryable: true,
  },
  SUBSONIC_API_ERROR: {
    title: 'Music Server Error',
    description: 'The Subsonic server rejected the request.',
    recommendation: 'Check the username and password.',
    severity: 'error',
    retryable: false,
  },
  SUBSONIC_INVALID_RESPONSE: {
    title: 'Invalid Music Server Response',
    description: 'The response was not a Subsonic JSON envelope.',
    recommendation: 'Make sure the URL points at a Subsonic-compatible server.',
    severity: 'error',
    retryable: false,
  },

  // Cast errors
  CAST_FAILED: {
    title: 'Cast Failed',
    description: 'The cast device did not accept the media.',
    recommendation: 'Check that the device is on and reachable.',
    severity: 'error',
    retryable: true,
  },

  // Unknown
  UNKNOWN: {
    title: 'Unknown Error',
    description: 'An unexpected error occurred.',
    recommendation: 'Check the logs for details.',
    severity: 'warning',
    retryable: true,
  },
};

/**
 * Check whether a string is a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, value);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) return ERROR_TAXONOMY[errorCode];
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
    recommendation: 'Check the logs for details.',
    severity: 'warning',
    retryable: true,
  };
}

/**
 * Get user-friendly error message
 */
export function getErrorMessage(errorCode: string | null): string {
  const info = getErrorInfo(errorCode);
  if (!info) return '';
  return `${info.title}: ${info.description}`;
}

/**
 * Whether switching strategy or retrying later could help
 */
export function isRetryableError(errorCode: string | null): boolean {
  return getErrorInfo(errorCode)?.retryable ?? false;
}
