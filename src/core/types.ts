import { z } from 'zod';
import type { ErrorRecord } from './errors.js';

// ===== Configuration =====

export const CAPABILITIES = [
  'ai', 'version-control', 'container', 'cloud', 'database', 'test-runner',
] as const;

export type Capability = typeof CAPABILITIES[number];

export const FlagsSchema = z.object({
  webFramework: z.boolean().default(false),
  container: z.boolean().default(false),
  ai: z.boolean().default(false),
  git: z.boolean().default(true),
  ci: z.boolean().default(true),
  docs: z.boolean().default(true),
  tests: z.boolean().default(true),
}).default({});

export const ProjectConfigSchema = z.object({
  projectName: z.string().min(1, 'projectName is required'),
  packageName: z.string().optional(),
  version: z.string().default('0.1.0'),
  description: z.string().default('A Python package'),
  author: z.string().default('Package Author'),
  email: z.string().default('author@example.com'),
  license: z.string().default('MIT'),
  pythonRequires: z.string().default('>=3.9'),
  outputDir: z.string().min(1, 'outputDir is required'),
  template: z.string().default('library'),
  flags: FlagsSchema,
  testFramework: z.enum(['pytest', 'unittest']).default('pytest'),
  dependencies: z.array(z.string()).default([]),
  devDependencies: z.array(z.string()).default([]),
  requiredCapabilities: z.array(z.enum(CAPABILITIES)).default([]),
  providerTimeoutMs: z.number().int().positive().default(30_000),
  copyrightYear: z.number().int().optional(),
  options: z.record(z.unknown()).default({}),
});

export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

export type ProjectFlags = z.infer<typeof FlagsSchema>;

/** Parsed configuration; `packageName` and `copyrightYear` are always resolved. */
export type ProjectConfig = Readonly<
  Omit<z.infer<typeof ProjectConfigSchema>, 'packageName' | 'copyrightYear' | 'flags'> & {
    packageName: string;
    copyrightYear: number;
    flags: Readonly<ProjectFlags>;
  }
>;

// ===== Pipeline =====

export type StageName = 'validation' | 'generation' | 'testing' | 'documentation' | 'packaging';

export const STAGE_ORDER: readonly StageName[] = [
  'validation', 'generation', 'testing', 'documentation', 'packaging',
];

export type StageStatus = 'succeeded' | 'degraded' | 'skipped' | 'failed' | 'not-run';

export type RunStatus = 'succeeded' | 'failed' | 'cancelled';

export interface StageResult {
  name: StageName;
  status: StageStatus;
  duration: number;
  filesAdded: number;
  warnings: string[];
  error?: ErrorRecord;
}

export interface ManifestSummaryEntry {
  path: string;
  size: number;
  provenance: string;
  superseded: string[];
  written: boolean;
}

export interface ProviderSelection {
  capability: Capability;
  provider: string | null;
  reason?: string;
}

export interface GenerationReport {
  runId: string;
  status: RunStatus;
  outputDir: string;
  packageName: string;
  duration: number;
  /** Milliseconds from run start to the end of each recorded stage */
  timeline: Record<string, number>;
  stages: StageResult[];
  files: ManifestSummaryEntry[];
  providers: ProviderSelection[];
  warnings: string[];
  failedStage?: StageName;
  error?: ErrorRecord;
}

// ===== Events =====

export interface PysmithEvents {
  'run:start': { runId: string; packageName: string; outputDir: string };
  'stage:start': { stage: StageName; index: number };
  'stage:complete': { stage: StageName; result: StageResult };
  'stage:skipped': { stage: StageName; reason: string };
  'manifest:override': { path: string; replaced: string; by: string };
  'provider:selected': ProviderSelection;
  'run:complete': { report: GenerationReport };
}
