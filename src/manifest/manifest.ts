/**
 * File Manifest: the in-memory map of output path to content producer.
 *
 * Entries hold a producer rather than rendered text so that very large trees
 * are rendered one file at a time when they are materialized. Paths are
 * unique; a second add for the same path is a GenerationError unless it is
 * an explicit override, in which case the replaced provenance is kept. A path
 * is never both a file and the parent directory of another entry.
 */

import { posix } from 'path';
import type { StageName } from '../core/types.js';
import { GenerationError } from '../core/errors.js';

export type FileContent = string | Uint8Array;
export type ContentProducer = () => FileContent;

export interface Provenance {
  /** Descriptor name, or `stage:<name>` for files a stage builds itself */
  source: string;
  stage: StageName;
}

export interface ManifestEntry {
  readonly path: string;
  readonly provenance: Provenance;
  readonly override: boolean;
  readonly superseded: readonly Provenance[];
  readonly produce: ContentProducer;
}

export interface AddOptions {
  override?: boolean;
  /** Provenance of contributions that lost to this entry before it reached the manifest */
  superseded?: Provenance[];
}

export type OverrideListener = (path: string, replaced: Provenance, by: Provenance) => void;

export function formatProvenance(p: Provenance): string {
  return `${p.stage}/${p.source}`;
}

/**
 * Normalize a manifest path to a relative POSIX path. Rejects absolute
 * paths and any `..` segment so nothing can escape the output directory.
 */
export function normalizeManifestPath(path: string): string {
  const segments = path.replace(/\\/g, '/').split('/').filter(s => s !== '' && s !== '.');
  if (path.startsWith('/') || segments.includes('..') || segments.length === 0) {
    throw new GenerationError(`Invalid manifest path "${path}"`, path);
  }
  return posix.join(...segments);
}

/** Every ancestor directory of a normalized path, outermost first: `a/b/c.py` -> `a`, `a/b` */
export function parentDirs(path: string): string[] {
  const segments = path.split('/');
  return segments.slice(1).map((_, i) => segments.slice(0, i + 1).join('/'));
}

export function contentSize(content: FileContent): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.byteLength;
}

export class FileManifest {
  private entries = new Map<string, ManifestEntry>();
  private dirs = new Set<string>();
  private overrideListeners: OverrideListener[] = [];

  onOverride(listener: OverrideListener): void {
    this.overrideListeners.push(listener);
  }

  add(path: string, produce: ContentProducer, provenance: Provenance, options: AddOptions = {}): ManifestEntry {
    const normalized = normalizeManifestPath(path);
    const existing = this.entries.get(normalized);
    const superseded: Provenance[] = [...(options.superseded ?? [])];
    this.assertNoFileDirClash(normalized, provenance);

    if (existing) {
      if (!options.override) {
        throw new GenerationError(
          `Manifest conflict: "${normalized}" was already produced by ${formatProvenance(existing.provenance)}; ` +
            `${formatProvenance(provenance)} must flag it as an override`,
          normalized,
        );
      }
      superseded.unshift(...existing.superseded, existing.provenance);
      for (const listener of this.overrideListeners) {
        listener(normalized, existing.provenance, provenance);
      }
    }

    const entry: ManifestEntry = {
      path: normalized,
      provenance,
      override: options.override ?? false,
      superseded,
      produce,
    };
    // Re-insert so an overridden entry moves to the end of the iteration order
    this.entries.delete(normalized);
    this.entries.set(normalized, entry);
    for (const dir of parentDirs(normalized)) this.dirs.add(dir);
    return entry;
  }

  private assertNoFileDirClash(path: string, provenance: Provenance): void {
    if (this.dirs.has(path)) {
      throw new GenerationError(
        `Manifest conflict: ${formatProvenance(provenance)} produces file "${path}", which is already a directory`,
        path,
      );
    }
    const file = parentDirs(path).find(dir => this.entries.has(dir));
    if (file !== undefined) {
      const owner = this.entries.get(file)?.provenance;
      throw new GenerationError(
        `Manifest conflict: "${path}" needs directory "${file}", which is a file` +
          (owner ? ` from ${formatProvenance(owner)}` : ''),
        path,
      );
    }
  }

  /** Convenience for already-rendered text */
  addText(path: string, text: string, provenance: Provenance, options?: AddOptions): ManifestEntry {
    return this.add(path, () => text, provenance, options);
  }

  has(path: string): boolean {
    return this.entries.has(normalizeManifestPath(path));
  }

  get(path: string): ManifestEntry | undefined {
    return this.entries.get(normalizeManifestPath(path));
  }

  /** Render the content of one entry */
  read(path: string): FileContent {
    const entry = this.get(path);
    if (!entry) {
      throw new GenerationError(`No manifest entry for "${path}"`, path);
    }
    return entry.produce();
  }

  readText(path: string): string {
    const content = this.read(path);
    return typeof content === 'string' ? content : Buffer.from(content).toString('utf-8');
  }

  paths(): string[] {
    return [...this.entries.keys()];
  }

  list(): ManifestEntry[] {
    return [...this.entries.values()];
  }

  addedBy(stage: StageName): ManifestEntry[] {
    return this.list().filter(e => e.provenance.stage === stage);
  }

  get size(): number {
    return this.entries.size;
  }
}
