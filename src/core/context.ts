import { nanoid } from 'nanoid';
import type { ProjectConfig, StageName, StageResult } from './types.js';
import type { EventBus } from './events.js';
import { getLogger } from './logger.js';
import { FileManifest, formatProvenance } from '../manifest/manifest.js';
import { Materializer } from '../manifest/materializer.js';
import { ExpansionEngine } from '../templates/expander.js';
import type { TemplateRegistry } from '../templates/registry.js';
import type { TemplateScope } from '../templates/scope.js';
import type { ProviderRegistry } from '../providers/registry.js';
import { Timer } from '../utils/timer.js';

export interface PipelineContextInit {
  config: ProjectConfig;
  templates: TemplateRegistry;
  providers: ProviderRegistry;
  events: EventBus;
  signal?: AbortSignal;
  concurrency?: number;
}

/** Bookkeeping for the stage that is currently running */
interface ActiveStage {
  name: StageName;
  warnings: string[];
  degraded: boolean;
}

/**
 * Everything one generation run accumulates. Created by the orchestrator at
 * run start and never reused.
 */
export class PipelineContext {
  public readonly id: string;
  public readonly startTime: number;
  public readonly config: ProjectConfig;
  public readonly templates: TemplateRegistry;
  public readonly providers: ProviderRegistry;
  public readonly events: EventBus;
  public readonly signal?: AbortSignal;

  public readonly manifest = new FileManifest();
  public readonly materializer: Materializer;
  public readonly engine: ExpansionEngine;
  public readonly scope: TemplateScope;
  public readonly timer = new Timer();

  public readonly results: StageResult[] = [];
  /** Run-level warnings, each prefixed with the stage that raised it */
  public readonly warnings: string[] = [];

  private stageCursor = -1;
  private active?: ActiveStage;
  private logger = getLogger();

  constructor(init: PipelineContextInit) {
    this.id = nanoid(12);
    this.startTime = Date.now();
    this.config = init.config;
    this.templates = init.templates;
    this.providers = init.providers;
    this.events = init.events;
    this.signal = init.signal;

    this.materializer = new Materializer(init.config.outputDir, { concurrency: init.concurrency });
    this.engine = new ExpansionEngine(init.templates.snippets);
    this.scope = init.templates.scopeFor(init.config);

    this.manifest.onOverride((path, replaced, by) => {
      this.warn(`${path} from ${formatProvenance(replaced)} was overridden by ${formatProvenance(by)}`);
      this.events.emit('manifest:override', { path, replaced: formatProvenance(replaced), by: formatProvenance(by) });
    });
  }

  get cursor(): number {
    return this.stageCursor;
  }

  get elapsed(): number {
    return Date.now() - this.startTime;
  }

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  /** Move the cursor to the next stage. The cursor only ever increases. */
  beginStage(name: StageName): number {
    this.stageCursor += 1;
    this.active = { name, warnings: [], degraded: false };
    return this.stageCursor;
  }

  /** Close the active stage and hand back what it collected */
  endStage(): { warnings: string[]; degraded: boolean } {
    const active = this.active;
    this.active = undefined;
    return { warnings: active?.warnings ?? [], degraded: active?.degraded ?? false };
  }

  warn(message: string): void {
    const stage = this.active?.name;
    this.active?.warnings.push(message);
    this.warnings.push(stage ? `[${stage}] ${message}` : message);
    this.logger.warn({ runId: this.id, stage }, message);
  }

  /** Record that an optional provider call failed in the active stage */
  markDegraded(): void {
    if (this.active) this.active.degraded = true;
  }

  record(result: StageResult): void {
    this.results.push(result);
    this.timer.lap(result.name);
  }

  result(stage: StageName): StageResult | undefined {
    return this.results.find(r => r.name === stage);
  }

  /** True when the stage ran to completion, degraded or not */
  completed(stage: StageName): boolean {
    const status = this.result(stage)?.status;
    return status === 'succeeded' || status === 'degraded';
  }
}
