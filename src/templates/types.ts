/**
 * Template descriptor types.
 *
 * A descriptor is a declarative file tree plus metadata. Directory nodes are
 * plain mappings; leaves are content instructions. Instruction objects use
 * `$`-prefixed keys, so a segment name can never be mistaken for one.
 */

import type { StageName } from '../core/types.js';

export type DescriptorKind = 'base' | 'feature';

export type DescriptorPhase = Exclude<StageName, 'validation'>;

/** A flag name, `!flag`, or a list of those that must all hold */
export type Condition = string | string[];

export interface SnippetInstruction {
  $template: string;
  $when?: Condition;
}

export interface LiteralInstruction {
  $content: string;
  $when?: Condition;
}

export interface Variant {
  $when?: Condition;
  $template?: string;
  $content?: string;
}

export interface VariantsInstruction {
  $variants: Variant[];
}

export type ContentInstruction = string | SnippetInstruction | LiteralInstruction | VariantsInstruction;

export interface StructureTree {
  [segment: string]: StructureNode;
}

export type StructureNode = StructureTree | ContentInstruction;

export interface TemplateDescriptor {
  name: string;
  version: string;
  description: string;
  kind: DescriptorKind;
  phase: DescriptorPhase;
  when: string[];
  dependencies: string[];
  devDependencies: string[];
  features: string[];
  structure: StructureTree;
  /** File the descriptor was loaded from, when it came from disk */
  source?: string;
}
