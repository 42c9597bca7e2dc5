/**
 * Load-time validation for template descriptors. A descriptor that fails
 * here never reaches a generation run.
 */

import { z } from 'zod';
import { ValidationError, type Violation } from '../core/errors.js';
import { conditionTerms, isFlagName, parseFlagRef } from './scope.js';
import type { SnippetStore } from './renderer.js';
import type {
  Condition,
  ContentInstruction,
  StructureTree,
  TemplateDescriptor,
} from './types.js';

const ConditionSchema = z.union([z.string(), z.array(z.string())]);

const DescriptorHeaderSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_-]*$/, 'name must be lowercase letters, digits, "-" or "_"'),
  version: z.string().default('1.0.0'),
  description: z.string().default(''),
  kind: z.enum(['base', 'feature']),
  phase: z.enum(['generation', 'testing', 'documentation', 'packaging']).default('generation'),
  when: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  devDependencies: z.array(z.string()).default([]),
  features: z.array(z.string()).default([]),
  structure: z.record(z.unknown()),
});

const SnippetLeafSchema = z.object({ $template: z.string().min(1), $when: ConditionSchema.optional() }).strict();
const LiteralLeafSchema = z.object({ $content: z.string(), $when: ConditionSchema.optional() }).strict();
const VariantSchema = z.object({
  $when: ConditionSchema.optional(),
  $template: z.string().min(1).optional(),
  $content: z.string().optional(),
}).strict().refine(v => (v.$template === undefined) !== (v.$content === undefined), {
  message: 'a variant needs exactly one of $template or $content',
});
const VariantsLeafSchema = z.object({ $variants: z.array(VariantSchema).min(1) }).strict();

function isInstructionObject(value: Record<string, unknown>): boolean {
  return Object.keys(value).some(k => k.startsWith('$'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class StructureChecker {
  readonly violations: Violation[] = [];

  constructor(private readonly snippets: SnippetStore) {}

  checkTree(node: Record<string, unknown>, path: string[]): StructureTree {
    const tree: StructureTree = {};
    for (const [segment, child] of Object.entries(node)) {
      const childPath = [...path, segment];
      const where = childPath.join('/');

      if (segment === '' || segment === '.' || segment === '..' || segment.includes('/') || segment.startsWith('$')) {
        this.violations.push({ field: where, message: `invalid path segment "${segment}"` });
        continue;
      }

      if (isRecord(child) && !isInstructionObject(child)) {
        tree[segment] = this.checkTree(child, childPath);
        continue;
      }

      const leaf = this.checkLeaf(child, where);
      if (leaf !== undefined) tree[segment] = leaf;
    }
    return tree;
  }

  private checkLeaf(value: unknown, where: string): ContentInstruction | undefined {
    if (typeof value === 'string') return value;
    // An empty YAML value means an empty file
    if (value === null) return '';

    if (!isRecord(value)) {
      this.violations.push({ field: where, message: 'leaf must be literal text, a $template, a $content or a $variants list' });
      return undefined;
    }

    const parsed = z.union([SnippetLeafSchema, LiteralLeafSchema, VariantsLeafSchema]).safeParse(value);
    if (!parsed.success) {
      this.violations.push({ field: where, message: `invalid content instruction: ${parsed.error.issues[0]?.message ?? 'unknown shape'}` });
      return undefined;
    }

    const leaf = parsed.data;
    if ('$variants' in leaf) {
      for (const variant of leaf.$variants) {
        this.checkCondition(variant.$when, where);
        if (variant.$template !== undefined) this.checkSnippet(variant.$template, where);
      }
    } else {
      this.checkCondition(leaf.$when, where);
      if ('$template' in leaf) this.checkSnippet(leaf.$template, where);
    }
    return leaf;
  }

  private checkCondition(condition: Condition | undefined, where: string): void {
    for (const term of conditionTerms(condition)) {
      const { flag } = parseFlagRef(term);
      if (!isFlagName(flag)) {
        this.violations.push({ field: where, message: `unknown flag "${flag}" in condition` });
      }
    }
  }

  private checkSnippet(name: string, where: string): void {
    if (!this.snippets.has(name)) {
      this.violations.push({ field: where, message: `unknown snippet "${name}"` });
    }
  }
}

/**
 * Validate a raw descriptor (usually parsed YAML) and return the typed form.
 * All violations are collected and reported together.
 */
export function parseDescriptor(raw: unknown, snippets: SnippetStore, source?: string): TemplateDescriptor {
  const label = source ?? (isRecord(raw) && typeof raw.name === 'string' ? raw.name : '(anonymous)');
  const header = DescriptorHeaderSchema.safeParse(raw);
  if (!header.success) {
    const violations = header.error.issues.map(i => ({ field: i.path.join('.') || '(root)', message: i.message }));
    throw new ValidationError(
      `Invalid template descriptor ${label}: ${violations.map(v => `${v.field}: ${v.message}`).join('; ')}`,
      violations,
      source,
    );
  }

  const checker = new StructureChecker(snippets);
  const structure = checker.checkTree(header.data.structure, []);
  for (const term of header.data.when) {
    const { flag } = parseFlagRef(term);
    if (!isFlagName(flag)) checker.violations.push({ field: 'when', message: `unknown flag "${flag}"` });
  }

  if (checker.violations.length > 0) {
    throw new ValidationError(
      `Invalid template descriptor ${label}: ${checker.violations.map(v => `${v.field}: ${v.message}`).join('; ')}`,
      checker.violations,
      checker.violations[0].field,
    );
  }

  return { ...header.data, structure, source };
}
