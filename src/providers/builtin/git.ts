import type { ProviderFactoryContext, ProviderRequest, ProviderResult } from '../types.js';
import { BaseProvider } from '../base.js';

export interface GitIdentity {
  name: string;
  email: string;
}

/** version-control through the local git executable */
export class GitProvider extends BaseProvider {
  readonly name = 'git';
  readonly capabilities = ['version-control'] as const;

  constructor(private readonly identity: GitIdentity) {
    super();
  }

  async validateConnection(): Promise<boolean> {
    const { exitCode } = await this.runCommand('git', ['--version']);
    return exitCode === 0;
  }

  protected async _execute(request: ProviderRequest): Promise<ProviderResult> {
    if (request.action !== 'init-repository') this.unsupported(request);
    const cwd = request.cwd;
    if (!cwd) throw new Error('init-repository needs a working directory');

    const message = String(request.params?.message ?? 'Initial commit');
    const steps: Array<[label: string, args: string[]]> = [
      ['init', ['init', '--initial-branch=main']],
      ['add', ['add', '--all']],
      ['commit', [
        '-c', `user.name=${this.identity.name}`,
        '-c', `user.email=${this.identity.email}`,
        'commit', '--quiet', '-m', message,
      ]],
    ];

    const output: string[] = [];
    for (const [label, args] of steps) {
      const result = await this.runCommand('git', args, cwd);
      if (result.exitCode !== 0) {
        throw new Error(`git ${label} failed: ${result.stderr.trim() || result.stdout.trim()}`);
      }
      output.push(result.stdout.trim());
    }
    return { ok: true, output: output.filter(Boolean).join('\n') };
  }
}

export function createGitProvider({ config }: ProviderFactoryContext): GitProvider {
  return new GitProvider({ name: config.author, email: config.email });
}
