import type { PipelineContext } from '../core/context.js';
import { BaseStage } from './base-stage.js';

/**
 * Build metadata, CI and container files, then the optional auxiliary
 * actions: a first commit and an image build.
 */
export class PackagingStage extends BaseStage {
  readonly name = 'packaging' as const;
  readonly requires = 'a successful generation stage';

  precondition(ctx: PipelineContext): boolean {
    return ctx.completed('generation');
  }

  protected async execute(ctx: PipelineContext): Promise<void> {
    this.expandPhase(ctx, 'packaging');
    await this.persist(ctx);

    const { config } = ctx;
    if (config.flags.git) {
      await this.useCapability(ctx, 'version-control', {
        action: 'init-repository',
        cwd: config.outputDir,
        params: { message: `Initial commit of ${config.projectName}` },
      });
    }

    if (config.flags.container && config.options.buildImage === true) {
      const result = await this.useCapability(ctx, 'container', {
        action: 'build-image',
        cwd: config.outputDir,
        params: { tag: `${config.packageName}:${config.version}` },
      });
      if (result) this.logger.info({ tag: result.data?.tag }, 'Container image built');
    }
  }
}
