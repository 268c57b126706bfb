// Strategy selection and lifecycle for a single extraction
import type { Dispatcher } from 'undici';
import {
  EXTRACTION_METHODS,
  EXTRACTION_METHOD_ALIASES,
  type ExtractionMethod,
  type ExtractionResult,
  type StreamTarget,
  type VideoInfo,
} from '@streamcast/shared';
import type { BrowserLauncher, CapabilityProbe } from '../automation/types';
import { AutomatedPageExtractor } from '../extraction/automated';
import { failed } from '../extraction/result';
import { StaticPageExtractor } from '../extraction/static';
import type { VideoExtractor } from '../extraction/types';
import { MetadataExtractor } from '../metadata/metadata-extractor';
import type { MetadataSource } from '../metadata/types';
import type { WorkerPool } from '../metadata/worker-pool';
import { coordinatorLogger, formatError } from '../utils/logger';

export interface CoordinatorDeps {
  launcher: BrowserLauncher;
  metadataSource: MetadataSource;
  pool: WorkerPool;
  /** Dispatcher for the static strategy; each extractor owns an Agent when omitted */
  dispatcher?: Dispatcher;
  userAgent?: string;
  staticTimeoutMs?: number;
  /** Settle intervals for the automated strategy, mostly for tests */
  automation?: {
    navigationSettleMs?: number;
    clickSettleMs?: number;
    contentSettleMs?: number;
  };
}

export interface ExtractOptions {
  /** Hard deadline for the whole extraction; 0 or absent means none */
  timeoutMs?: number;
}

export type CapabilityReport = Record<ExtractionMethod, CapabilityProbe>;

/**
 * Accepts the canonical method names plus their legacy aliases
 */
export function normalizeExtractionMethod(value: string): ExtractionMethod | null {
  const key = value.trim().toLowerCase();
  const canonical = EXTRACTION_METHODS.find((method) => method === key);
  return canonical ?? EXTRACTION_METHOD_ALIASES[key] ?? null;
}

export class ExtractionCoordinator {
  private readonly browserCapability: CapabilityProbe;

  constructor(private readonly deps: CoordinatorDeps) {
    this.browserCapability = deps.launcher.probe();
  }

  capabilities(): CapabilityReport {
    return {
      static: { available: true, detail: 'built in' },
      automated: this.browserCapability,
      metadata: this.deps.metadataSource.capability,
    };
  }

  createExtractor(target: StreamTarget, method: ExtractionMethod): VideoExtractor {
    const { deps } = this;
    switch (method) {
      case 'static':
        return new StaticPageExtractor(target, {
          dispatcher: deps.dispatcher,
          userAgent: deps.userAgent,
          timeoutMs: deps.staticTimeoutMs,
        });
      case 'automated':
        return new AutomatedPageExtractor(target, {
          launcher: deps.launcher,
          userAgent: deps.userAgent,
          ...deps.automation,
        });
      case 'metadata':
        return new MetadataExtractor(target, {
          source: deps.metadataSource,
          pool: deps.pool,
          userAgent: deps.userAgent,
        });
    }
  }

  /**
   * Run exactly one strategy. The extractor is always closed afterwards; when
   * the deadline passes first it is closed early, which tears down any browser
   * it started, and the late result is discarded.
   */
  async extract(target: StreamTarget, method: ExtractionMethod, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const extractor = this.createExtractor(target, method);
    coordinatorLogger.info(`Extracting ${target.url} with ${method}`);

    try {
      const result = await this.runWithDeadline(extractor, options.timeoutMs ?? 0);
      if (result.resolvedUrl) {
        coordinatorLogger.info(`Resolved ${target.url} -> ${result.resolvedUrl}`);
      } else {
        coordinatorLogger.warn(`No video URL extracted from ${target.url} (${result.errorCode ?? 'UNKNOWN'}: ${result.diagnostic})`);
      }
      return result;
    } catch (error) {
      coordinatorLogger.error(`Extraction of ${target.url} failed: ${formatError(error)}`, error);
      return failed(method, 'UNKNOWN', formatError(error));
    } finally {
      await extractor.close();
    }
  }

  async getVideoUrl(target: StreamTarget, method: ExtractionMethod, options: ExtractOptions = {}): Promise<string | null> {
    const result = await this.extract(target, method, options);
    return result.resolvedUrl;
  }

  async getVideoInfo(target: StreamTarget): Promise<VideoInfo | null> {
    const extractor = new MetadataExtractor(target, {
      source: this.deps.metadataSource,
      pool: this.deps.pool,
      userAgent: this.deps.userAgent,
    });
    return extractor.getVideoInfo();
  }

  private async runWithDeadline(extractor: VideoExtractor, timeoutMs: number): Promise<ExtractionResult> {
    if (timeoutMs <= 0) {
      return extractor.extract();
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
    });

    try {
      const result = await Promise.race([extractor.extract(), deadline]);
      if (result) {
        return result;
      }
    } finally {
      clearTimeout(timer);
    }

    coordinatorLogger.warn(`Extraction exceeded ${timeoutMs}ms, closing ${extractor.method} extractor`);
    await extractor.close();
    return failed(extractor.method, 'EXTRACTION_DEADLINE_EXCEEDED', `No result within ${timeoutMs}ms`);
  }
}
