import type { Stage } from './types.js';
import { ValidationStage } from './validation.js';
import { GenerationStage } from './generation.js';
import { TestingStage } from './testing.js';
import { DocumentationStage } from './documentation.js';
import { PackagingStage } from './packaging.js';

/** The fixed pipeline, in execution order */
export function createDefaultStages(): Stage[] {
  return [
    new ValidationStage(),
    new GenerationStage(),
    new TestingStage(),
    new DocumentationStage(),
    new PackagingStage(),
  ];
}

export type { Stage } from './types.js';
export { BaseStage, type CapabilityOptions } from './base-stage.js';
export { ValidationStage, checkConfig, PYTHON_KEYWORDS } from './validation.js';
export { GenerationStage } from './generation.js';
export { TestingStage, topLevelModules } from './testing.js';
export { DocumentationStage, moduleNames, renderApiDoc } from './documentation.js';
export { PackagingStage } from './packaging.js';
