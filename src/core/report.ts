import type { PipelineContext } from './context.js';
import type { ErrorRecord } from './errors.js';
import type { GenerationReport, ManifestSummaryEntry, RunStatus, StageName } from './types.js';
import { formatProvenance } from '../manifest/manifest.js';
import { formatDuration } from '../utils/timer.js';

export interface ReportOutcome {
  status: RunStatus;
  failedStage?: StageName;
  error?: ErrorRecord;
}

export function summarizeManifest(ctx: PipelineContext): ManifestSummaryEntry[] {
  return ctx.manifest
    .list()
    .map(entry => ({
      path: entry.path,
      size: ctx.materializer.sizeOf(entry.path) ?? 0,
      provenance: formatProvenance(entry.provenance),
      superseded: entry.superseded.map(formatProvenance),
      written: ctx.materializer.isWritten(entry.path),
    }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export function buildReport(ctx: PipelineContext, outcome: ReportOutcome): GenerationReport {
  const report: GenerationReport = {
    runId: ctx.id,
    status: outcome.status,
    outputDir: ctx.config.outputDir,
    packageName: ctx.config.packageName,
    duration: ctx.timer.stop(),
    timeline: ctx.timer.getLaps(),
    stages: [...ctx.results],
    files: summarizeManifest(ctx),
    providers: ctx.providers.selections(),
    warnings: [...ctx.warnings],
  };
  if (outcome.failedStage) report.failedStage = outcome.failedStage;
  if (outcome.error) report.error = outcome.error;
  return report;
}

const STATUS_MARK: Record<string, string> = {
  succeeded: '✓',
  degraded: '!',
  skipped: '-',
  failed: '✗',
  'not-run': ' ',
};

/** Plain-text rendering for terminals */
export function formatReport(report: GenerationReport): string {
  const lines: string[] = [];
  lines.push(`Run ${report.runId}: ${report.status} in ${formatDuration(report.duration)}`);
  lines.push(`Output: ${report.outputDir}`);
  lines.push('');

  for (const stage of report.stages) {
    const files = stage.filesAdded > 0 ? `, ${stage.filesAdded} files` : '';
    lines.push(`  [${STATUS_MARK[stage.status] ?? '?'}] ${stage.name.padEnd(14)} ${stage.status} (${formatDuration(stage.duration)}${files})`);
    for (const warning of stage.warnings) lines.push(`        ${warning}`);
    if (stage.error) {
      const where = stage.error.path ?? stage.error.provider ?? stage.error.capability;
      lines.push(`        ${stage.error.kind}: ${stage.error.message}${where ? ` [${where}]` : ''}`);
      for (const v of stage.error.violations ?? []) lines.push(`          - ${v.field}: ${v.message}`);
    }
  }

  const written = report.files.filter(f => f.written).length;
  lines.push('');
  lines.push(`Files: ${written} written of ${report.files.length} planned`);
  if (report.providers.length > 0) {
    lines.push(`Providers: ${report.providers.map(p => `${p.capability}=${p.provider ?? 'unavailable'}`).join(', ')}`);
  }
  return lines.join('\n');
}
