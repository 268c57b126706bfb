import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import {
  DEFAULT_POPUP_SELECTORS,
  DEFAULT_VIDEO_SELECTORS,
  type ExtractionMethod,
} from '@streamcast/shared';
import { normalizeExtractionMethod } from '@streamcast/extractor';
import { EnvConfig } from './env.validation';

export interface NavidromeConfig {
  url: string;
  username: string;
  password: string;
}

function splitList(value: string | undefined, fallback: readonly string[]): string[] {
  const items = (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  return items.length > 0 ? items : [...fallback];
}

@Injectable()
export class PlayerConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  get nodeEnv(): string {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): number {
    return parseInt(this.configService.get('PORT', { infer: true }), 10);
  }

  get apiPrefix(): string {
    return this.configService.get('API_PREFIX', { infer: true });
  }

  get streamUrl(): string | null {
    return this.configService.get('STREAM_URL', { infer: true }) ?? null;
  }

  get extractionMethod(): ExtractionMethod {
    return normalizeExtractionMethod(this.configService.get('EXTRACTION_METHOD', { infer: true })) ?? 'metadata';
  }

  get popupSelectors(): string[] {
    return splitList(this.configService.get('POPUP_SELECTORS', { infer: true }), DEFAULT_POPUP_SELECTORS);
  }

  get videoSelectors(): string[] {
    return splitList(this.configService.get('VIDEO_SELECTORS', { infer: true }), DEFAULT_VIDEO_SELECTORS);
  }

  get extractionTimeoutMs(): number {
    return parseInt(this.configService.get('EXTRACTION_TIMEOUT_MS', { infer: true }), 10);
  }

  get browserExecutablePath(): string | null {
    return this.configService.get('BROWSER_EXECUTABLE_PATH', { infer: true }) || null;
  }

  get ytdlpBinary(): string {
    return this.configService.get('YTDLP_BINARY', { infer: true });
  }

  get metadataWorkers(): number {
    return parseInt(this.configService.get('METADATA_WORKERS', { infer: true }), 10);
  }

  /**
   * Null unless URL, username and password are all set
   */
  get navidrome(): NavidromeConfig | null {
    const url = this.configService.get('NAVIDROME_URL', { infer: true });
    const username = this.configService.get('NAVIDROME_USERNAME', { infer: true });
    const password = this.configService.get('NAVIDROME_PASSWORD', { infer: true });
    if (!url || !username || !password) {
      return null;
    }
    return { url, username, password };
  }

  get castTarget(): string | null {
    return this.configService.get('CAST_TARGET', { infer: true }) || null;
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}
