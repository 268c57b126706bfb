// yt-dlp command-line metadata source
import { execFile } from 'child_process';
import type { CapabilityProbe } from '../automation/types';
import { metadataLogger, formatError } from '../utils/logger';
import { MetadataSourceError, rawVideoInfoSchema, type ExtractInfoOptions, type MetadataSource, type RawVideoInfo } from './types';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs: number;
  maxBuffer: number;
}

/**
 * Runs a binary to completion. Rejects with the process error when it exits
 * non-zero, with whatever it wrote to stderr attached.
 */
export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<CommandOutput>;

export class CommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export const runCommand: CommandRunner = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: options.timeoutMs, maxBuffer: options.maxBuffer, encoding: 'utf8', windowsHide: true },
      (error, stdout, stderr) => {
        if (error) {
          const exitCode = typeof error.code === 'number' ? error.code : null;
          reject(new CommandError(error.message, exitCode, stderr));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });

export interface YtDlpOptions {
  binary?: string;  // default 'yt-dlp'
  timeoutMs?: number;  // default 120000
  runner?: CommandRunner;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Pick the message yt-dlp printed for a failure, e.g.
 * `ERROR: Unsupported URL: https://example.com/`
 */
export function parseYtDlpError(stderr: string, fallback: string): string {
  const lines = stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const errorLine = [...lines].reverse().find((line) => line.startsWith('ERROR:'));
  if (errorLine) {
    return errorLine.slice('ERROR:'.length).trim();
  }
  return lines.length > 0 ? lines[lines.length - 1] : fallback;
}

export class YtDlpSource implements MetadataSource {
  private constructor(
    readonly capability: CapabilityProbe,
    private readonly binary: string,
    private readonly timeoutMs: number,
    private readonly runner: CommandRunner,
  ) {}

  /**
   * Probe the binary once with `--version`; the source reports itself
   * unavailable when that fails
   */
  static async create(options: YtDlpOptions = {}): Promise<YtDlpSource> {
    const binary = options.binary ?? 'yt-dlp';
    const timeoutMs = options.timeoutMs ?? 120000;
    const runner = options.runner ?? runCommand;

    let capability: CapabilityProbe;
    try {
      const { stdout } = await runner(binary, ['--version'], { timeoutMs: 10000, maxBuffer: 1024 * 1024 });
      capability = { available: true, detail: `${binary} ${stdout.trim()}` };
      metadataLogger.info(`Using ${capability.detail}`);
    } catch (error) {
      capability = { available: false, detail: `${binary} not runnable: ${formatError(error)}` };
    }

    return new YtDlpSource(capability, binary, timeoutMs, runner);
  }

  async extractInfo(url: string, options: ExtractInfoOptions): Promise<RawVideoInfo> {
    const args = ['--dump-single-json', '--skip-download', '--no-warnings', '--no-color', '--no-progress'];
    if (options.format) {
      args.push('--format', options.format);
    }
    if (options.geoBypass) {
      args.push('--geo-bypass');
    }
    if (options.userAgent) {
      args.push('--user-agent', options.userAgent);
    }
    args.push('--', url);

    let output: CommandOutput;
    try {
      output = await this.runner(this.binary, args, { timeoutMs: this.timeoutMs, maxBuffer: MAX_BUFFER });
    } catch (error) {
      if (error instanceof CommandError) {
        throw new MetadataSourceError(parseYtDlpError(error.stderr, formatError(error)), error.exitCode);
      }
      throw new MetadataSourceError(formatError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(output.stdout);
    } catch (error) {
      throw new MetadataSourceError(`Invalid JSON from ${this.binary}: ${formatError(error)}`);
    }

    const result = rawVideoInfoSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new MetadataSourceError(`Unexpected info document: ${issues}`);
    }
    return result.data;
  }
}
