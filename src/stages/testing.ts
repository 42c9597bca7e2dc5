import type { PipelineContext } from '../core/context.js';
import { GenerationError } from '../core/errors.js';
import { assertResolvable, renderSnippet } from '../templates/renderer.js';
import type { TemplateScope } from '../templates/scope.js';
import { BaseStage } from './base-stage.js';

/** Public top-level modules of the generated package, e.g. `core` for src/pkg/core.py */
export function topLevelModules(paths: string[], packageName: string): string[] {
  const prefix = `src/${packageName}/`;
  return paths
    .filter(p => p.startsWith(prefix) && p.endsWith('.py'))
    .map(p => p.slice(prefix.length, -'.py'.length))
    .filter(name => !name.includes('/') && !name.startsWith('_'))
    .sort();
}

function pascalCase(name: string): string {
  return name.split('_').filter(Boolean).map(s => s[0].toUpperCase() + s.slice(1)).join('');
}

/**
 * Adds the test-suite scaffolding, one smoke test per generated module, and
 * runs the suite when a test-runner is available.
 */
export class TestingStage extends BaseStage {
  readonly name = 'testing' as const;
  readonly requires = 'flags.tests';

  precondition(ctx: PipelineContext): boolean {
    return ctx.config.flags.tests && ctx.completed('generation');
  }

  protected async execute(ctx: PipelineContext): Promise<void> {
    this.expandPhase(ctx, 'testing');
    this.addModuleTests(ctx);
    await this.persist(ctx);

    const result = await this.useCapability(ctx, 'test-runner', { action: 'run-tests', cwd: ctx.config.outputDir });
    if (result) {
      const passed = Number(result.data?.passed ?? 0);
      const failed = Number(result.data?.failed ?? 0);
      ctx.warn(`${passed} passed, ${failed} failed`);
    }
  }

  private addModuleTests(ctx: PipelineContext): void {
    const snippetName = `test_module_${ctx.config.testFramework}`;
    const snippet = ctx.templates.snippets.get(snippetName);
    if (snippet === undefined) {
      throw new GenerationError(`Missing snippet "${snippetName}" for module tests`);
    }

    for (const module of topLevelModules(ctx.manifest.paths(), ctx.config.packageName)) {
      const path = `tests/test_${module}.py`;
      if (ctx.manifest.has(path)) continue;

      const scope: TemplateScope = {
        flags: ctx.scope.flags,
        vars: { ...ctx.scope.vars, module_name: module, module_class: pascalCase(module) },
      };
      assertResolvable(snippet, scope, path);
      ctx.manifest.add(path, () => renderSnippet(snippet, scope, path), this.provenance());
    }
  }
}
