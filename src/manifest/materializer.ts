/**
 * Materializer: writes manifest entries under the output directory.
 *
 * Each flush writes only the entries that changed since the previous flush,
 * with bounded parallelism. Every write is attributed to the stage that
 * flushed it so a failing stage can roll back exactly its own files.
 */

import { writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { StageName } from '../core/types.js';
import { FileSystemError, GenerationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { AsyncSemaphore } from '../utils/semaphore.js';
import { ensureDir, pathExists, removeEmptyDirs, removeFile } from '../utils/fs.js';
import { contentSize, type FileManifest, type ManifestEntry } from './manifest.js';

export interface WriteRecord {
  path: string;
  absolutePath: string;
  stage: StageName;
  size: number;
}

/** Directories a write had to create: `top` is the outermost, `leaf` the file's parent */
interface CreatedDirs {
  stage: StageName;
  leaf: string;
  top: string;
}

export interface FlushResult {
  written: string[];
  skipped: string[];
  warnings: string[];
}

export interface MaterializerOptions {
  concurrency?: number;
}

export class Materializer {
  private records = new Map<string, WriteRecord>();
  private created: CreatedDirs[] = [];
  /** Last entry object handled per path; a different object means it was overridden since */
  private handled = new Map<string, ManifestEntry>();
  private semaphore: AsyncSemaphore;
  private logger = getLogger();

  constructor(
    public readonly outputDir: string,
    options: MaterializerOptions = {},
  ) {
    this.semaphore = new AsyncSemaphore(options.concurrency ?? 8);
  }

  /**
   * Write every pending entry. Existing files that this run did not create are
   * only replaced when the entry is flagged `override`.
   */
  async flush(manifest: FileManifest, stage: StageName): Promise<FlushResult> {
    const pending = manifest.list().filter(e => this.handled.get(e.path) !== e);
    const result: FlushResult = { written: [], skipped: [], warnings: [] };

    const outcomes = await Promise.allSettled(
      pending.map(entry => this.semaphore.withPermit(() => this.writeEntry(entry, stage, result))),
    );

    const failure = outcomes.find((o): o is PromiseRejectedResult => o.status === 'rejected');
    if (failure) {
      const reason: unknown = failure.reason;
      throw reason instanceof FileSystemError || reason instanceof GenerationError
        ? reason
        : new FileSystemError(`Failed to materialize: ${String(reason)}`, this.outputDir);
    }

    result.written.sort();
    result.skipped.sort();
    this.logger.debug({ stage, written: result.written.length, skipped: result.skipped.length }, 'Manifest flushed');
    return result;
  }

  private async writeEntry(entry: ManifestEntry, stage: StageName, result: FlushResult): Promise<void> {
    const absolutePath = join(this.outputDir, entry.path);
    const ownedByRun = this.records.has(entry.path);

    if (!ownedByRun && !entry.override && (await pathExists(absolutePath))) {
      this.handled.set(entry.path, entry);
      result.skipped.push(entry.path);
      result.warnings.push(`${entry.path} already exists and was not overwritten`);
      return;
    }

    try {
      const leaf = dirname(absolutePath);
      const top = await ensureDir(leaf);
      // Recorded before the write so a failed write can still be rolled back
      if (top !== undefined) this.created.push({ stage, leaf, top });

      const content = entry.produce();
      await writeFile(absolutePath, content);
      this.records.set(entry.path, { path: entry.path, absolutePath, stage, size: contentSize(content) });
      this.handled.set(entry.path, entry);
      result.written.push(entry.path);
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new FileSystemError(`Failed to write ${entry.path}: ${cause.message}`, entry.path, cause);
    }
  }

  /**
   * Remove the files a stage wrote, then any directories its writes created
   * that are now empty, including those of writes that failed. Returns the
   * removed manifest paths.
   */
  async rollback(stage: StageName): Promise<string[]> {
    const owned = [...this.records.values()].filter(r => r.stage === stage);
    for (const record of owned) {
      await removeFile(record.absolutePath);
      this.records.delete(record.path);
      this.handled.delete(record.path);
    }
    // Deepest directories first, and never above what the writes created
    const dirs = this.created.filter(c => c.stage === stage).sort((a, b) => b.leaf.length - a.leaf.length);
    for (const { leaf, top } of dirs) {
      await removeEmptyDirs(leaf, dirname(top));
    }
    this.created = this.created.filter(c => c.stage !== stage);
    this.logger.info({ stage, removed: owned.length, dirs: dirs.length }, 'Rolled back stage writes');
    return owned.map(r => r.path).sort();
  }

  /** True when the stage left anything on disk: files or directories */
  touchedBy(stage: StageName): boolean {
    return this.writtenBy(stage).length > 0 || this.created.some(c => c.stage === stage);
  }

  writtenBy(stage: StageName): string[] {
    return [...this.records.values()].filter(r => r.stage === stage).map(r => r.path);
  }

  isWritten(path: string): boolean {
    return this.records.has(path);
  }

  sizeOf(path: string): number | undefined {
    return this.records.get(path)?.size;
  }
}
