/**
 * Orchestrator: runs the fixed stage sequence against one context.
 *
 * A stage whose precondition does not hold is skipped. A failed stage is
 * compensated when it left files or directories on disk and every later stage is marked not-run.
 * Cancellation is checked between stages only; files already written stay.
 */

import type { GenerationReport, ProjectConfig, StageName, StageResult } from './types.js';
import { CancelledError, describeError, type ErrorRecord } from './errors.js';
import { EventBus } from './events.js';
import { PipelineContext } from './context.js';
import { getLogger } from './logger.js';
import { buildReport, type ReportOutcome } from './report.js';
import { TemplateRegistry } from '../templates/registry.js';
import { ProviderRegistry } from '../providers/registry.js';
import { BUILTIN_PROVIDERS } from '../providers/builtin/index.js';
import type { ProviderRegistration } from '../providers/types.js';
import { createDefaultStages, type Stage } from '../stages/index.js';

export interface OrchestratorOptions {
  templates?: TemplateRegistry;
  /** Custom descriptor directory loaded on top of the built-ins; ignored when `templates` is given */
  templatesDir?: string;
  /** Startup registration table; defaults to the built-in providers */
  providers?: readonly ProviderRegistration[];
  stages?: Stage[];
  events?: EventBus;
  env?: Readonly<Record<string, string | undefined>>;
  /** Parallel file writes per flush */
  concurrency?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

function placeholderResult(name: StageName, status: 'skipped' | 'not-run', reason?: string): StageResult {
  return { name, status, duration: 0, filesAdded: 0, warnings: reason ? [reason] : [] };
}

export class Orchestrator {
  public readonly events: EventBus;
  private templates?: TemplateRegistry;
  private templatesDir?: string;
  private stages: Stage[];
  private providers: readonly ProviderRegistration[];
  private env: Readonly<Record<string, string | undefined>>;
  private logger = getLogger();

  constructor(private readonly options: OrchestratorOptions = {}) {
    this.events = options.events ?? new EventBus();
    this.templates = options.templates;
    this.templatesDir = options.templatesDir;
    this.stages = options.stages ?? createDefaultStages();
    this.providers = options.providers ?? BUILTIN_PROVIDERS;
    this.env = options.env ?? process.env;
  }

  /** Descriptors are loaded once per orchestrator and shared by its runs */
  getTemplates(): TemplateRegistry {
    if (!this.templates) {
      this.templates = TemplateRegistry.load(undefined, this.templatesDir);
    }
    return this.templates;
  }

  async run(config: ProjectConfig, runOptions: RunOptions = {}): Promise<GenerationReport> {
    const providers = new ProviderRegistry(this.providers, { config, env: this.env }, {
      timeoutMs: config.providerTimeoutMs,
      events: this.events,
    });
    const ctx = new PipelineContext({
      config,
      templates: this.getTemplates(),
      providers,
      events: this.events,
      signal: runOptions.signal,
      concurrency: this.options.concurrency,
    });

    this.logger.info({ runId: ctx.id, packageName: config.packageName, outputDir: config.outputDir }, 'Generation run started');
    this.events.emit('run:start', { runId: ctx.id, packageName: config.packageName, outputDir: config.outputDir });

    let outcome: ReportOutcome = { status: 'succeeded' };
    try {
      outcome = await this.runStages(ctx);
    } finally {
      await providers.teardown();
    }

    const report = buildReport(ctx, outcome);
    this.logger.info({ runId: ctx.id, status: report.status, duration: report.duration }, 'Generation run finished');
    this.events.emit('run:complete', { report });
    return report;
  }

  private async runStages(ctx: PipelineContext): Promise<ReportOutcome> {
    let halted: ReportOutcome | undefined;

    for (const [index, stage] of this.stages.entries()) {
      if (!halted && ctx.cancelled) {
        halted = { status: 'cancelled', error: describeError(new CancelledError()) };
        this.logger.warn({ runId: ctx.id, before: stage.name }, 'Run cancelled');
      }

      if (halted) {
        ctx.record(placeholderResult(stage.name, 'not-run'));
        continue;
      }

      if (!stage.precondition(ctx)) {
        const reason = `requires ${stage.requires}`;
        ctx.record(placeholderResult(stage.name, 'skipped', reason));
        this.events.emit('stage:skipped', { stage: stage.name, reason });
        continue;
      }

      this.events.emit('stage:start', { stage: stage.name, index });
      const result = await stage.run(ctx);
      ctx.record(result);
      this.events.emit('stage:complete', { stage: stage.name, result });

      if (result.status === 'failed') {
        await this.compensate(ctx, stage);
        halted = { status: 'failed', failedStage: stage.name, error: result.error };
      }
    }

    return halted ?? { status: 'succeeded' };
  }

  private async compensate(ctx: PipelineContext, stage: Stage): Promise<void> {
    if (!stage.compensate || !ctx.materializer.touchedBy(stage.name)) return;
    try {
      const removed = await stage.compensate(ctx);
      this.logger.info({ runId: ctx.id, stage: stage.name, removed: removed.length }, 'Stage compensated');
    } catch (err) {
      const record: ErrorRecord = describeError(err);
      ctx.warn(`Compensation for ${stage.name} failed: ${record.message}`);
    }
  }
}
