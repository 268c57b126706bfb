import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  getErrorInfo,
  getErrorMessage,
  isRetryableError,
  type CastRequest,
  type ErrorCode,
  type ExtractionMethod,
  type PlayerState,
  type StreamTarget,
} from '@streamcast/shared';
import { ExtractionCoordinator, inferMimeType, type CapabilityReport } from '@streamcast/extractor';
import { PlayerConfigService } from '../config/config.service';
import { CAST_SINK, type CastSink } from '../cast/cast-sink';

export interface PlayerFailure {
  code: ErrorCode;
  /** Title and description from the error taxonomy */
  message: string;
  diagnostic: string;
  recommendation: string | null;
  retryable: boolean;
}

export interface PlayerStatus {
  state: PlayerState;
  streamUrl: string | null;
  castTarget: string | null;
  extractionMethod: ExtractionMethod;
  nowPlaying: CastRequest | null;
  lastFailure: PlayerFailure | null;
}

/**
 * Playback orchestrator. Resolves stream pages through the coordinator and
 * hands the result to the cast sink; any failure puts the player back to idle.
 */
@Injectable()
export class StreamPlayerService {
  private readonly logger = new Logger(StreamPlayerService.name);
  private state: PlayerState = 'idle';
  private streamUrl: string | null;
  private castTarget: string | null;
  private nowPlaying: CastRequest | null = null;
  private lastFailure: PlayerFailure | null = null;

  constructor(
    private readonly config: PlayerConfigService,
    private readonly coordinator: ExtractionCoordinator,
    @Inject(CAST_SINK) private readonly sink: CastSink,
  ) {
    this.streamUrl = config.streamUrl;
    this.castTarget = config.castTarget;
  }

  getStatus(): PlayerStatus {
    return {
      state: this.state,
      streamUrl: this.streamUrl,
      castTarget: this.castTarget,
      extractionMethod: this.config.extractionMethod,
      nowPlaying: this.nowPlaying,
      lastFailure: this.lastFailure,
    };
  }

  capabilities(): CapabilityReport {
    return this.coordinator.capabilities();
  }

  /**
   * Extract a media URL from the given page (or the configured one) and cast it
   */
  async playStream(url?: string): Promise<PlayerStatus> {
    const pageUrl = url || this.streamUrl;
    if (!pageUrl) {
      this.logger.warn('No stream URL configured');
      return this.fail('UNKNOWN', 'No stream URL configured');
    }

    this.state = 'playing';
    const target: StreamTarget = {
      url: pageUrl,
      popupSelectors: this.config.popupSelectors,
      videoSelectors: this.config.videoSelectors,
    };

    const result = await this.coordinator.extract(target, this.config.extractionMethod, {
      timeoutMs: this.config.extractionTimeoutMs,
    });

    if (!result.resolvedUrl) {
      this.logger.error(`Failed to extract video URL from ${pageUrl}: ${result.diagnostic}`);
      return this.fail(result.errorCode ?? 'UNKNOWN', result.diagnostic);
    }

    this.logger.log(`Extracted video URL: ${result.resolvedUrl}`);
    await this.cast({ url: result.resolvedUrl, mimeType: inferMimeType(result.resolvedUrl, 'video') });
    return this.getStatus();
  }

  /**
   * Hand a resolved URL to the sink. Used for stream pages and music alike.
   */
  async cast(request: Omit<CastRequest, 'target'>, target?: string | null): Promise<boolean> {
    const castRequest: CastRequest = { ...request, target: target || this.castTarget };
    this.state = 'playing';
    try {
      await this.sink.play(castRequest);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error casting ${castRequest.url}: ${message}`);
      this.fail('CAST_FAILED', message);
      return false;
    }

    this.nowPlaying = castRequest;
    this.lastFailure = null;
    return true;
  }

  async stopStream(): Promise<PlayerStatus> {
    try {
      await this.sink.stop(this.nowPlaying?.target ?? this.castTarget);
    } catch (error) {
      this.logger.error(`Error stopping stream: ${error instanceof Error ? error.message : String(error)}`);
    }
    this.state = 'idle';
    this.nowPlaying = null;
    return this.getStatus();
  }

  setStreamUrl(url: string): PlayerStatus {
    this.streamUrl = url;
    this.logger.log(`Stream URL set to ${url}`);
    return this.getStatus();
  }

  setCastTarget(target: string): PlayerStatus {
    this.castTarget = target;
    this.logger.log(`Cast target set to ${target}`);
    return this.getStatus();
  }

  private fail(code: ErrorCode, diagnostic: string): PlayerStatus {
    this.state = 'idle';
    this.nowPlaying = null;
    this.lastFailure = {
      code,
      message: getErrorMessage(code),
      diagnostic,
      recommendation: getErrorInfo(code)?.recommendation ?? null,
      retryable: isRetryableError(code),
    };
    return this.getStatus();
  }
}
