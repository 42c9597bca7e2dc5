/**
 * pysmith: generate a runnable Python package from one configuration
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, Orchestrator } from 'pysmith';
 *
 * const config = new ConfigManager().load('pysmith.yaml', { flags: { webFramework: true } });
 * const report = await new Orchestrator().run(config);
 * ```
 */

// Core
export { Orchestrator, type OrchestratorOptions, type RunOptions } from './core/orchestrator.js';
export { PipelineContext, type PipelineContextInit } from './core/context.js';
export { EventBus } from './core/events.js';
export { ConfigManager, parseConfig, derivePackageName, type RawConfig } from './core/config.js';
export { buildReport, formatReport, summarizeManifest } from './core/report.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export {
  PysmithError,
  ConfigError,
  ValidationError,
  GenerationError,
  FileSystemError,
  ProviderError,
  CancelledError,
  describeError,
  type ErrorKind,
  type ErrorRecord,
  type Violation,
} from './core/errors.js';
export {
  CAPABILITIES,
  STAGE_ORDER,
  ProjectConfigSchema,
  type Capability,
  type ProjectConfig,
  type ProjectConfigInput,
  type ProjectFlags,
  type StageName,
  type StageStatus,
  type StageResult,
  type RunStatus,
  type GenerationReport,
  type ManifestSummaryEntry,
  type ProviderSelection,
  type PysmithEvents,
} from './core/types.js';

// Manifest
export {
  FileManifest,
  formatProvenance,
  normalizeManifestPath,
  type ContentProducer,
  type FileContent,
  type ManifestEntry,
  type Provenance,
} from './manifest/manifest.js';
export { Materializer, type FlushResult, type WriteRecord } from './manifest/materializer.js';

// Templates
export { TemplateRegistry, defaultDescriptorDir } from './templates/registry.js';
export { ExpansionEngine, type ExpandedFile, type ExpansionSummary } from './templates/expander.js';
export { SnippetStore, renderSnippet } from './templates/renderer.js';
export { parseDescriptor } from './templates/schema.js';
export { buildScope, collectRequirements, FLAG_NAMES, type FlagName, type TemplateScope } from './templates/scope.js';
export type { TemplateDescriptor, StructureTree, ContentInstruction, DescriptorKind, DescriptorPhase } from './templates/types.js';

// Providers
export { ProviderRegistry, type ProviderRegistryOptions } from './providers/registry.js';
export { BaseProvider } from './providers/base.js';
export { BUILTIN_PROVIDERS, GitProvider, DockerProvider, PytestProvider, OpenAIProvider } from './providers/builtin/index.js';
export {
  isUnavailable,
  type Provider,
  type ProviderRegistration,
  type ProviderRequest,
  type ProviderResult,
  type Unavailable,
} from './providers/types.js';

// Stages
export {
  createDefaultStages,
  BaseStage,
  ValidationStage,
  GenerationStage,
  TestingStage,
  DocumentationStage,
  PackagingStage,
  type Stage,
} from './stages/index.js';

export { VERSION, NAME } from './version.js';
