import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Orchestrator } from '../../../src/core/orchestrator.js';
import type { PipelineContext } from '../../../src/core/context.js';
import { STAGE_ORDER, type StageName, type StageResult } from '../../../src/core/types.js';
import { createDefaultStages } from '../../../src/stages/index.js';
import type { Stage } from '../../../src/stages/types.js';
import { MockProvider, registrationFor } from '../../helpers/mock-provider.js';
import { makeConfig, makeTempDir, removeDir } from '../../helpers/fixtures.js';
import { builtinTemplates } from '../../helpers/context.js';

/** Scriptable stage: optionally writes one file, then returns the given status */
class StubStage implements Stage {
  readonly requires = 'the stub condition';
  ran = false;
  compensated = false;

  constructor(
    readonly name: StageName,
    private readonly status: StageResult['status'] = 'succeeded',
    private readonly options: { applies?: boolean; writes?: string; onRun?: () => void } = {},
  ) {}

  precondition(): boolean {
    return this.options.applies ?? true;
  }

  async run(ctx: PipelineContext): Promise<StageResult> {
    this.ran = true;
    this.options.onRun?.();
    if (this.options.writes) {
      ctx.manifest.addText(this.options.writes, 'x', { source: `stage:${this.name}`, stage: this.name });
      await ctx.materializer.flush(ctx.manifest, this.name);
    }
    return { name: this.name, status: this.status, duration: 1, filesAdded: this.options.writes ? 1 : 0, warnings: [] };
  }

  async compensate(ctx: PipelineContext): Promise<string[]> {
    this.compensated = true;
    return ctx.materializer.rollback(this.name);
  }
}

describe('Orchestrator', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function orchestrator(stages: Stage[]): Orchestrator {
    return new Orchestrator({ stages, providers: [], templates: builtinTemplates(), env: {} });
  }

  it('should build the default stages in pipeline order', () => {
    expect(createDefaultStages().map(s => s.name)).toEqual(STAGE_ORDER);
  });

  it('should run stages in order and succeed', async () => {
    const order: string[] = [];
    const names: StageName[] = ['validation', 'generation', 'testing', 'documentation', 'packaging'];
    const stages = names.map(n => new StubStage(n, 'succeeded', { onRun: () => order.push(n) }));

    const report = await orchestrator(stages).run(makeConfig({ outputDir: dir }));

    expect(order).toEqual(names);
    expect(report.status).toBe('succeeded');
    expect(report.stages.map(s => s.status)).toEqual(['succeeded', 'succeeded', 'succeeded', 'succeeded', 'succeeded']);
    expect(report.runId).toHaveLength(12);
    expect(Object.keys(report.timeline)).toEqual(names);
    expect(report.timeline.packaging).toBeGreaterThanOrEqual(report.timeline.validation);
    expect(report.duration).toBeGreaterThanOrEqual(report.timeline.packaging);
  });

  it('should record an unmet precondition as skipped and keep going', async () => {
    const stages = [
      new StubStage('validation'),
      new StubStage('testing', 'succeeded', { applies: false }),
      new StubStage('packaging'),
    ];

    const report = await orchestrator(stages).run(makeConfig({ outputDir: dir }));

    expect(report.status).toBe('succeeded');
    expect(report.stages[1]).toEqual({
      name: 'testing', status: 'skipped', duration: 0, filesAdded: 0, warnings: ['requires the stub condition'],
    });
    expect(stages[1].ran).toBe(false);
    expect(stages[2].ran).toBe(true);
  });

  it('should allow degraded stages in a successful run', async () => {
    const report = await orchestrator([new StubStage('validation'), new StubStage('documentation', 'degraded')])
      .run(makeConfig({ outputDir: dir }));

    expect(report.status).toBe('succeeded');
  });

  it('should compensate a failed stage that wrote files and mark the rest not-run', async () => {
    const failing = new StubStage('generation', 'failed', { writes: 'src/partial.py' });
    const later = new StubStage('packaging');

    const report = await orchestrator([new StubStage('validation'), failing, later]).run(makeConfig({ outputDir: dir }));

    expect(report.status).toBe('failed');
    expect(report.failedStage).toBe('generation');
    expect(report.stages.map(s => s.status)).toEqual(['succeeded', 'failed', 'not-run']);
    expect(failing.compensated).toBe(true);
    expect(later.ran).toBe(false);
    expect(existsSync(join(dir, 'src/partial.py'))).toBe(false);
    expect(existsSync(join(dir, 'src'))).toBe(false);
  });

  it('should not compensate a failed stage that wrote nothing', async () => {
    const failing = new StubStage('validation', 'failed');

    const report = await orchestrator([failing, new StubStage('generation')]).run(makeConfig({ outputDir: dir }));

    expect(failing.compensated).toBe(false);
    expect(report.stages.map(s => s.status)).toEqual(['failed', 'not-run']);
  });

  it('should stop between stages when cancelled and keep written files', async () => {
    const controller = new AbortController();
    const first = new StubStage('generation', 'succeeded', { writes: 'kept.txt', onRun: () => controller.abort() });
    const second = new StubStage('packaging');

    const report = await orchestrator([first, second]).run(makeConfig({ outputDir: dir }), { signal: controller.signal });

    expect(report.status).toBe('cancelled');
    expect(report.error?.kind).toBe('CancelledError');
    expect(report.stages.map(s => s.status)).toEqual(['succeeded', 'not-run']);
    expect(second.ran).toBe(false);
    expect(existsSync(join(dir, 'kept.txt'))).toBe(true);
  });

  it('should tear down providers at the end of the run', async () => {
    const git = new MockProvider('git', ['version-control']);
    const gitStage: Stage = {
      name: 'packaging',
      requires: 'nothing',
      precondition: () => true,
      run: async ctx => {
        await ctx.providers.get('version-control');
        return { name: 'packaging', status: 'succeeded', duration: 0, filesAdded: 0, warnings: [] };
      },
    };

    const report = await new Orchestrator({ stages: [gitStage], providers: [registrationFor(git)], templates: builtinTemplates(), env: {} })
      .run(makeConfig({ outputDir: dir }));

    expect(git.disposed).toBe(true);
    expect(report.providers).toEqual([{ capability: 'version-control', provider: 'git' }]);
  });

  it('should emit lifecycle events', async () => {
    const orch = orchestrator([new StubStage('validation'), new StubStage('testing', 'succeeded', { applies: false })]);
    const seen: string[] = [];
    orch.events.on('run:start', () => seen.push('run:start'));
    orch.events.on('stage:start', ({ stage }) => seen.push(`start:${stage}`));
    orch.events.on('stage:complete', ({ stage }) => seen.push(`complete:${stage}`));
    orch.events.on('stage:skipped', ({ stage }) => seen.push(`skipped:${stage}`));
    const done = vi.fn();
    orch.events.on('run:complete', done);

    const report = await orch.run(makeConfig({ outputDir: dir }));

    expect(seen).toEqual(['run:start', 'start:validation', 'complete:validation', 'skipped:testing']);
    expect(done).toHaveBeenCalledWith({ report });
  });

  it('should skip existing files with a warning during a full run', async () => {
    writeFileSync(join(dir, 'README.md'), 'mine');

    const report = await new Orchestrator({ providers: [], templates: builtinTemplates(), env: {} })
      .run(makeConfig({ outputDir: dir }));

    expect(report.status).toBe('succeeded');
    expect(report.warnings).toContain('[documentation] README.md already exists and was not overwritten');
    expect(report.files.find(f => f.path === 'README.md')?.written).toBe(false);
  });
});
