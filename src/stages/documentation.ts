import type { PipelineContext } from '../core/context.js';
import { BaseStage } from './base-stage.js';

/** Dotted module names for every Python file under src/, sorted */
export function moduleNames(paths: string[]): string[] {
  return paths
    .filter(p => p.startsWith('src/') && p.endsWith('.py'))
    .map(p => p.slice('src/'.length, -'.py'.length).split('/'))
    .map(parts => (parts[parts.length - 1] === '__init__' ? parts.slice(0, -1) : parts).join('.'))
    .sort();
}

export function renderApiDoc(projectName: string, modules: string[]): string {
  const lines = [`# ${projectName} API`, '', 'Modules:', ''];
  for (const name of modules) lines.push(`- \`${name}\``);
  return `${lines.join('\n')}\n`;
}

function summaryPrompt(ctx: PipelineContext): string {
  const { config } = ctx;
  const features = Object.entries(config.flags).filter(([, on]) => on).map(([flag]) => flag);
  return [
    `Write a short overview (two paragraphs, Markdown) of a Python package named "${config.packageName}".`,
    `Description: ${config.description}`,
    `Enabled features: ${features.join(', ') || 'none'}`,
    `Modules: ${moduleNames(ctx.manifest.paths()).join(', ')}`,
  ].join('\n');
}

/**
 * README, changelog, license, a module index and, with the ai flag, a
 * generated overview.
 */
export class DocumentationStage extends BaseStage {
  readonly name = 'documentation' as const;
  readonly requires = 'flags.docs';

  precondition(ctx: PipelineContext): boolean {
    return ctx.config.flags.docs && ctx.completed('generation');
  }

  protected async execute(ctx: PipelineContext): Promise<void> {
    this.expandPhase(ctx, 'documentation');

    const modules = moduleNames(ctx.manifest.paths());
    ctx.manifest.addText('docs/api.md', renderApiDoc(ctx.config.projectName, modules), this.provenance());

    if (ctx.config.flags.ai) {
      const result = await this.useCapability(ctx, 'ai', { action: 'complete', params: { prompt: summaryPrompt(ctx) } });
      if (result?.ok) {
        ctx.manifest.addText('docs/overview.md', `${result.output.trim()}\n`, this.provenance());
      } else if (result) {
        ctx.warn('ai returned an empty overview');
        ctx.markDegraded();
      }
    }

    await this.persist(ctx);
  }
}
