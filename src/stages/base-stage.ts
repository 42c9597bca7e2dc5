import type { PipelineContext } from '../core/context.js';
import type { Capability, StageName, StageResult } from '../core/types.js';
import { ProviderError, describeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { Provenance } from '../manifest/manifest.js';
import { isUnavailable, type ProviderRequest, type ProviderResult } from '../providers/types.js';
import type { DescriptorPhase } from '../templates/types.js';
import type { ExpansionSummary } from '../templates/expander.js';
import { Timer } from '../utils/timer.js';
import { TimeoutError, withTimeout } from '../utils/retry.js';
import type { Stage } from './types.js';

export interface CapabilityOptions {
  /** Overrides `config.requiredCapabilities` for this call */
  required?: boolean;
}

export abstract class BaseStage implements Stage {
  abstract readonly name: StageName;
  abstract readonly requires: string;

  protected logger = getLogger();

  abstract precondition(ctx: PipelineContext): boolean;

  async run(ctx: PipelineContext): Promise<StageResult> {
    const timer = new Timer();
    ctx.beginStage(this.name);
    this.logger.debug({ runId: ctx.id, stage: this.name, cursor: ctx.cursor }, 'Running stage');

    try {
      await this.execute(ctx);
      const duration = timer.stop();
      const { warnings, degraded } = ctx.endStage();

      return {
        name: this.name,
        status: degraded ? 'degraded' : 'succeeded',
        duration,
        filesAdded: ctx.manifest.addedBy(this.name).length,
        warnings,
      };
    } catch (err) {
      const duration = timer.stop();
      const { warnings } = ctx.endStage();
      const error = describeError(err);
      this.logger.error({ runId: ctx.id, stage: this.name, kind: error.kind, error: error.message }, 'Stage failed');

      return {
        name: this.name,
        status: 'failed',
        duration,
        filesAdded: ctx.manifest.addedBy(this.name).length,
        warnings,
        error,
      };
    }
  }

  /** Remove every file this stage wrote during the run */
  async compensate(ctx: PipelineContext): Promise<string[]> {
    return ctx.materializer.rollback(this.name);
  }

  protected abstract execute(ctx: PipelineContext): Promise<void>;

  protected provenance(source: string = `stage:${this.name}`): Provenance {
    return { source, stage: this.name };
  }

  /** Expand every applicable descriptor of a phase into the manifest */
  protected expandPhase(ctx: PipelineContext, phase: DescriptorPhase): ExpansionSummary {
    const descriptors = ctx.templates.applicable(ctx.config, phase);
    const summary = ctx.engine.expandInto(ctx.manifest, descriptors, ctx.scope, this.name);
    this.logger.debug(
      { stage: this.name, descriptors: descriptors.map(d => d.name), files: summary.added.length },
      'Descriptors expanded',
    );
    return summary;
  }

  /** Write the entries added since the last flush */
  protected async persist(ctx: PipelineContext): Promise<string[]> {
    const result = await ctx.materializer.flush(ctx.manifest, this.name);
    for (const warning of result.warnings) ctx.warn(warning);
    return result.written;
  }

  /**
   * Call a provider under the run's timeout. An optional capability that is
   * unavailable, fails or times out marks the stage degraded and yields null;
   * a required one throws ProviderError.
   */
  protected async useCapability(
    ctx: PipelineContext,
    capability: Capability,
    request: ProviderRequest,
    options: CapabilityOptions = {},
  ): Promise<ProviderResult | null> {
    const required = options.required ?? ctx.config.requiredCapabilities.includes(capability);
    const timeoutMs = ctx.config.providerTimeoutMs;

    const lookup = required
      ? await ctx.providers.getRequired(capability)
      : await ctx.providers.get(capability);
    if (isUnavailable(lookup)) {
      ctx.warn(`${capability} unavailable, skipped ${request.action}: ${lookup.reason}`);
      ctx.markDegraded();
      return null;
    }

    try {
      const result = await withTimeout(
        lookup.execute(request),
        timeoutMs,
        `${lookup.name} ${request.action} timed out after ${timeoutMs}ms`,
      );
      this.logger.info({ stage: this.name, provider: lookup.name, action: request.action, ok: result.ok }, 'Provider call finished');
      return result;
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      if (required) {
        throw new ProviderError(`${lookup.name} ${request.action} failed: ${cause.message}`, capability, lookup.name, cause);
      }
      const what = cause instanceof TimeoutError ? 'timed out' : `failed: ${cause.message}`;
      ctx.warn(`${lookup.name} ${request.action} ${what}`);
      ctx.markDegraded();
      return null;
    }
  }
}
