import type { ProviderFactoryContext, ProviderRequest, ProviderResult } from '../types.js';
import { BaseProvider } from '../base.js';

/** container through the docker CLI */
export class DockerProvider extends BaseProvider {
  readonly name = 'docker';
  readonly capabilities = ['container'] as const;

  constructor(private readonly defaultTag: string) {
    super();
  }

  async validateConnection(): Promise<boolean> {
    const { exitCode } = await this.runCommand('docker', ['info', '--format', 'json']);
    return exitCode === 0;
  }

  protected async _execute(request: ProviderRequest): Promise<ProviderResult> {
    if (request.action !== 'build-image') this.unsupported(request);
    const cwd = request.cwd;
    if (!cwd) throw new Error('build-image needs a build context directory');

    const tag = String(request.params?.tag ?? this.defaultTag);
    const result = await this.runCommand('docker', ['build', '--tag', tag, '.'], cwd);
    if (result.exitCode !== 0) {
      throw new Error(`docker build failed: ${result.stderr.trim().split('\n').slice(-3).join(' ')}`);
    }
    return { ok: true, output: result.stdout, data: { tag } };
  }
}

export function createDockerProvider({ config }: ProviderFactoryContext): DockerProvider {
  return new DockerProvider(`${config.packageName}:${config.version}`);
}
