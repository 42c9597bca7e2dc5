/**
 * Template Registry: the descriptor store.
 *
 * Built-in descriptors live as YAML under `descriptors/` at the package root,
 * with their snippets under `descriptors/snippets/`. Everything is validated
 * when the registry is loaded.
 */

import { readdirSync, readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ProjectConfig } from '../core/types.js';
import { ValidationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { findPackageRoot } from '../utils/fs.js';
import { SnippetStore } from './renderer.js';
import { parseDescriptor } from './schema.js';
import { buildScope, collectRequirements, evaluateCondition, type TemplateScope } from './scope.js';
import type { DescriptorKind, DescriptorPhase, TemplateDescriptor } from './types.js';

export function defaultDescriptorDir(): string {
  return join(findPackageRoot(import.meta.url), 'descriptors');
}

export class TemplateRegistry {
  private descriptors: Map<string, TemplateDescriptor> = new Map();
  private logger = getLogger();

  constructor(public readonly snippets: SnippetStore = new SnippetStore()) {}

  /**
   * Load the built-in descriptors, then those of a custom directory. Custom
   * snippets replace built-in ones of the same name; a custom descriptor may
   * not reuse a built-in descriptor's name.
   */
  static load(dir: string = defaultDescriptorDir(), customDir?: string): TemplateRegistry {
    const registry = new TemplateRegistry();
    registry.loadDirectory(dir);
    if (customDir !== undefined) {
      registry.loadDirectory(customDir);
    }
    return registry;
  }

  /** Add the snippets and every *.yaml / *.yml descriptor in a directory */
  loadDirectory(dir: string): void {
    if (!existsSync(dir)) {
      throw new ValidationError(`Descriptor directory not found: ${dir}`, [], dir);
    }
    this.snippets.loadDirectory(join(dir, 'snippets'));

    let count = 0;
    for (const file of readdirSync(dir).sort()) {
      if (!file.endsWith('.yaml') && !file.endsWith('.yml')) continue;
      const source = join(dir, file);
      let raw: unknown;
      try {
        raw = parseYaml(readFileSync(source, 'utf-8'));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ValidationError(`Descriptor ${source} is not valid YAML: ${message}`, [], source);
      }
      this.register(raw, source);
      count++;
    }

    this.logger.debug({ dir, count }, 'Template descriptors loaded');
  }

  /** Validate and add a descriptor */
  register(raw: unknown, source?: string): TemplateDescriptor {
    const descriptor = parseDescriptor(raw, this.snippets, source);
    if (this.descriptors.has(descriptor.name)) {
      throw new ValidationError(`Duplicate template descriptor "${descriptor.name}"`, [], source);
    }
    this.descriptors.set(descriptor.name, descriptor);
    return descriptor;
  }

  get(name: string): TemplateDescriptor | undefined {
    return this.descriptors.get(name);
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  list(filter?: { kind?: DescriptorKind; phase?: DescriptorPhase }): TemplateDescriptor[] {
    let descriptors = Array.from(this.descriptors.values());
    if (filter?.kind) {
      descriptors = descriptors.filter(d => d.kind === filter.kind);
    }
    if (filter?.phase) {
      descriptors = descriptors.filter(d => d.phase === filter.phase);
    }
    return descriptors.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Names of the base descriptors a configuration may select */
  baseTemplates(): string[] {
    return this.list({ kind: 'base', phase: 'generation' }).map(d => d.name);
  }

  /**
   * Descriptors that apply to a configuration, base first, then features by
   * name. A generation-phase base applies only when it is the selected
   * template; everything else applies when its `when` conditions hold.
   */
  applicable(config: ProjectConfig, phase?: DescriptorPhase): TemplateDescriptor[] {
    const flags = buildScope(config, { dependencies: [], devDependencies: [] }).flags;
    const selected = this.list().filter(d => {
      if (phase && d.phase !== phase) return false;
      if (d.kind === 'base' && d.phase === 'generation' && d.name !== config.template) return false;
      return evaluateCondition(d.when, flags);
    });
    const rank = (d: TemplateDescriptor) => (d.kind === 'base' ? 0 : 1);
    return selected.sort((a, b) => rank(a) - rank(b) || a.name.localeCompare(b.name));
  }

  /**
   * Scope shared by every stage of one run: configuration variables plus the
   * requirements of every applicable descriptor, across all phases.
   */
  scopeFor(config: ProjectConfig): TemplateScope {
    return buildScope(config, collectRequirements(config, this.applicable(config)));
  }
}
