import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Capability } from '../core/types.js';
import { getLogger } from '../core/logger.js';
import { retry } from '../utils/retry.js';
import type { Provider, ProviderRequest, ProviderResult } from './types.js';

const execFileAsync = promisify(execFile);

export interface BaseProviderOptions {
  maxRetries?: number;
  retryableErrors?: string[];
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

interface ExecFailure extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return err instanceof Error && ('stdout' in err || 'code' in err);
}

export abstract class BaseProvider implements Provider {
  abstract readonly name: string;
  abstract readonly capabilities: readonly Capability[];

  protected logger = getLogger();
  protected options: Required<BaseProviderOptions>;

  constructor(options: BaseProviderOptions = {}) {
    this.options = {
      maxRetries: 0,
      retryableErrors: [],
      ...options,
    };
  }

  async execute(request: ProviderRequest): Promise<ProviderResult> {
    this.logger.debug({ provider: this.name, action: request.action }, 'Provider request');

    return retry(() => this._execute(request), {
      maxRetries: this.options.maxRetries,
      baseDelay: 1000,
      retryableErrors: this.options.retryableErrors,
      onRetry: (attempt, error) => {
        this.logger.warn({ provider: this.name, attempt, error: error.message }, 'Retrying provider call');
      },
    });
  }

  abstract validateConnection(): Promise<boolean>;

  protected abstract _execute(request: ProviderRequest): Promise<ProviderResult>;

  /**
   * Run a local executable. A non-zero exit is returned, not thrown; a missing
   * executable still throws.
   */
  protected async runCommand(file: string, args: string[], cwd?: string): Promise<CommandOutput> {
    try {
      const { stdout, stderr } = await execFileAsync(file, args, { cwd, encoding: 'utf-8', maxBuffer: 10 * 1024 * 1024 });
      return { exitCode: 0, stdout, stderr };
    } catch (err) {
      if (isExecFailure(err) && typeof err.code === 'number') {
        return { exitCode: err.code, stdout: err.stdout ?? '', stderr: err.stderr ?? '' };
      }
      throw err;
    }
  }

  protected unsupported(request: ProviderRequest): never {
    throw new Error(`${this.name} does not support action "${request.action}"`);
  }
}
