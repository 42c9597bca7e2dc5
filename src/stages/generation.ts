import type { PipelineContext } from '../core/context.js';
import { BaseStage } from './base-stage.js';

/**
 * Expands the selected base descriptor plus the applicable feature
 * descriptors and materializes them under the output directory.
 */
export class GenerationStage extends BaseStage {
  readonly name = 'generation' as const;
  readonly requires = 'a successful validation stage';

  precondition(ctx: PipelineContext): boolean {
    return ctx.completed('validation');
  }

  protected async execute(ctx: PipelineContext): Promise<void> {
    const summary = this.expandPhase(ctx, 'generation');
    for (const { path, winner, loser } of summary.superseded) {
      this.logger.info({ path, winner, loser }, 'Feature descriptor replaced base file');
    }

    const written = await this.persist(ctx);
    this.logger.info({ runId: ctx.id, files: written.length, outputDir: ctx.config.outputDir }, 'Source tree written');
  }
}
