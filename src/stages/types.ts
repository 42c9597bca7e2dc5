import type { PipelineContext } from '../core/context.js';
import type { StageName, StageResult } from '../core/types.js';

export interface Stage {
  readonly name: StageName;
  /** Human-readable form of the precondition, used as the skip reason */
  readonly requires: string;

  precondition(ctx: PipelineContext): boolean;
  /** Never throws; failures come back as a `failed` result */
  run(ctx: PipelineContext): Promise<StageResult>;
  /** Undo this stage's durable writes */
  compensate?(ctx: PipelineContext): Promise<string[]>;
}
