import type { ProviderFactoryContext, ProviderRequest, ProviderResult } from '../types.js';
import { BaseProvider } from '../base.js';

export interface TestCounts {
  passed: number;
  failed: number;
}

/**
 * Pull pass/fail counts out of pytest's summary line or unittest's footer.
 */
export function parseTestSummary(output: string): TestCounts {
  const count = (pattern: RegExp) => {
    const match = output.match(pattern);
    return match ? Number(match[1]) : 0;
  };

  const ran = output.match(/Ran (\d+) tests?/);
  if (ran) {
    const failed = count(/failures=(\d+)/) + count(/errors=(\d+)/);
    return { passed: Number(ran[1]) - failed, failed };
  }
  return { passed: count(/(\d+) passed/), failed: count(/(\d+) failed/) + count(/(\d+) errors?\b/) };
}

/** test-runner through a local Python interpreter */
export class PytestProvider extends BaseProvider {
  readonly name = 'pytest';
  readonly capabilities = ['test-runner'] as const;

  constructor(
    private readonly python: string,
    private readonly framework: 'pytest' | 'unittest',
  ) {
    super();
  }

  async validateConnection(): Promise<boolean> {
    const args = this.framework === 'pytest' ? ['-m', 'pytest', '--version'] : ['--version'];
    const { exitCode } = await this.runCommand(this.python, args);
    return exitCode === 0;
  }

  protected async _execute(request: ProviderRequest): Promise<ProviderResult> {
    if (request.action !== 'run-tests') this.unsupported(request);
    const args = this.framework === 'pytest'
      ? ['-m', 'pytest', '-q', '--no-header', 'tests']
      : ['-m', 'unittest', 'discover', '-s', 'tests', '-t', '.'];

    const result = await this.runCommand(this.python, args, request.cwd);
    const output = `${result.stdout}\n${result.stderr}`;
    const counts = parseTestSummary(output);
    return { ok: result.exitCode === 0, output, data: { ...counts } };
  }
}

export function createPytestProvider({ config, env }: ProviderFactoryContext): PytestProvider {
  const python = typeof config.options.python === 'string' ? config.options.python : env.PYTHON ?? 'python3';
  return new PytestProvider(python, config.testFramework);
}
