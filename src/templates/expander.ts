/**
 * Template Expansion Engine
 *
 * Depth-first walk of a descriptor's structure tree. Directory segments get
 * placeholder substitution; leaves are resolved to a lazy content producer,
 * or dropped when their flag conditions do not hold. Keys are visited in
 * sorted order so the output never depends on YAML key order.
 */

import { GenerationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { StageName } from '../core/types.js';
import { parentDirs, type ContentProducer, type FileManifest, type Provenance } from '../manifest/manifest.js';
import { assertResolvable, renderSnippet, resolveSegment, type SnippetStore } from './renderer.js';
import { evaluateCondition, type TemplateScope } from './scope.js';
import type { ContentInstruction, StructureNode, StructureTree, TemplateDescriptor } from './types.js';

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface ExpandedFile {
  path: string;
  descriptor: TemplateDescriptor;
  produce: ContentProducer;
}

export interface Supersession {
  path: string;
  winner: string;
  loser: string;
}

export interface ExpansionSummary {
  added: string[];
  superseded: Supersession[];
}

/** Files and directories one descriptor has produced so far */
interface WalkState {
  files: Set<string>;
  dirs: Set<string>;
}

function isDirectory(node: StructureNode): node is StructureTree {
  return typeof node === 'object' && !('$template' in node) && !('$content' in node) && !('$variants' in node);
}

export class ExpansionEngine {
  private logger = getLogger();

  constructor(private readonly snippets: SnippetStore) {}

  /**
   * Lazily yield the files of one descriptor. Placeholders are checked while
   * walking; content is only rendered when a producer is called.
   */
  *expand(descriptor: TemplateDescriptor, scope: TemplateScope): Generator<ExpandedFile> {
    const state: WalkState = { files: new Set(), dirs: new Set() };
    yield* this.walk(descriptor, descriptor.structure, [], [], scope, state);
  }

  private *walk(
    descriptor: TemplateDescriptor,
    tree: StructureTree,
    rawSegments: string[],
    segments: string[],
    scope: TemplateScope,
    state: WalkState,
  ): Generator<ExpandedFile> {
    for (const key of Object.keys(tree).sort()) {
      const node = tree[key];
      const rawPath = [...rawSegments, key].join('/');
      const { value, substituted } = resolveSegment(key, scope, rawPath);

      if (value === '' || value === '.' || value === '..' || value.includes('/')) {
        throw new GenerationError(`Segment "${key}" of ${rawPath} resolves to invalid path segment "${value}"`, rawPath);
      }
      // Substituted directory names become Python packages
      if (substituted && !IDENTIFIER_RE.test(value) && isDirectory(node)) {
        throw new GenerationError(`Segment "${key}" of ${rawPath} resolves to "${value}", which is not a valid identifier`, rawPath);
      }
      const childSegments = [...segments, value];

      if (isDirectory(node)) {
        yield* this.walk(descriptor, node, [...rawSegments, key], childSegments, scope, state);
        continue;
      }

      const path = childSegments.join('/');
      const produce = this.resolveLeaf(node, scope, path, descriptor);
      if (!produce) continue;

      if (state.files.has(path)) {
        throw new GenerationError(`Descriptor "${descriptor.name}" produces "${path}" more than once`, path);
      }
      const parents = parentDirs(path);
      if (state.dirs.has(path) || parents.some(dir => state.files.has(dir))) {
        throw new GenerationError(`Descriptor "${descriptor.name}" produces "${path}" as both a file and a directory`, path);
      }
      state.files.add(path);
      for (const dir of parents) state.dirs.add(dir);
      yield { path, descriptor, produce };
    }
  }

  private resolveLeaf(
    node: ContentInstruction,
    scope: TemplateScope,
    path: string,
    descriptor: TemplateDescriptor,
  ): ContentProducer | null {
    if (typeof node === 'string') {
      return this.producerFor(node, scope, path);
    }

    if ('$variants' in node) {
      const match = node.$variants.find(v => evaluateCondition(v.$when, scope.flags));
      if (!match) return null;
      if (match.$template !== undefined) return this.producerFor(this.snippet(match.$template, path, descriptor), scope, path);
      return this.producerFor(match.$content ?? '', scope, path);
    }

    if (!evaluateCondition(node.$when, scope.flags)) return null;
    if ('$template' in node) {
      return this.producerFor(this.snippet(node.$template, path, descriptor), scope, path);
    }
    return this.producerFor(node.$content, scope, path);
  }

  private snippet(name: string, path: string, descriptor: TemplateDescriptor): string {
    const text = this.snippets.get(name);
    if (text === undefined) {
      throw new GenerationError(`Descriptor "${descriptor.name}" references unknown snippet "${name}" for ${path}`, path);
    }
    return text;
  }

  private producerFor(text: string, scope: TemplateScope, path: string): ContentProducer {
    assertResolvable(text, scope, path);
    return () => renderSnippet(text, scope, path);
  }

  /**
   * Expand several descriptors into the manifest. When a base and a feature
   * descriptor produce the same path the feature wins and the base is kept in
   * the entry's superseded provenance. Two descriptors of the same kind
   * producing one path is a conflict.
   */
  expandInto(
    manifest: FileManifest,
    descriptors: TemplateDescriptor[],
    scope: TemplateScope,
    stage: StageName,
  ): ExpansionSummary {
    const batch = new Map<string, { file: ExpandedFile; superseded: Provenance[] }>();
    const summary: ExpansionSummary = { added: [], superseded: [] };
    const provenanceOf = (d: TemplateDescriptor): Provenance => ({ source: d.name, stage });

    for (const descriptor of descriptors) {
      for (const file of this.expand(descriptor, scope)) {
        const current = batch.get(file.path);
        if (!current) {
          batch.set(file.path, { file, superseded: [] });
          continue;
        }

        const incumbent = current.file.descriptor;
        if (incumbent.kind === descriptor.kind) {
          throw new GenerationError(
            `Descriptors "${incumbent.name}" and "${descriptor.name}" both produce "${file.path}"`,
            file.path,
          );
        }

        const [winner, loser] = descriptor.kind === 'feature' ? [file, current.file] : [current.file, file];
        batch.set(file.path, { file: winner, superseded: [...current.superseded, provenanceOf(loser.descriptor)] });
        summary.superseded.push({ path: file.path, winner: winner.descriptor.name, loser: loser.descriptor.name });
        this.logger.debug({ path: file.path, winner: winner.descriptor.name, loser: loser.descriptor.name }, 'Base file superseded');
      }
    }

    const ordered = [...batch.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [path, { file, superseded }] of ordered) {
      manifest.add(path, file.produce, provenanceOf(file.descriptor), { superseded });
      summary.added.push(path);
    }

    return summary;
  }
}
