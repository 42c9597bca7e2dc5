import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FileManifest } from '../../../src/manifest/manifest.js';
import { Materializer } from '../../../src/manifest/materializer.js';
import { FileSystemError, GenerationError } from '../../../src/core/errors.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

const gen = { source: 'library', stage: 'generation' as const };
const pack = { source: 'packaging', stage: 'packaging' as const };

describe('Materializer', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should write entries and create parent directories', async () => {
    const manifest = new FileManifest();
    manifest.addText('src/pkg/__init__.py', '__version__ = "0.1.0"\n', gen);
    manifest.addText('README.md', '# Demo\n', gen);

    const result = await new Materializer(dir).flush(manifest, 'generation');

    expect(result.written).toEqual(['README.md', 'src/pkg/__init__.py']);
    expect(readFileSync(join(dir, 'src/pkg/__init__.py'), 'utf-8')).toBe('__version__ = "0.1.0"\n');
  });

  it('should only write entries added since the previous flush', async () => {
    const manifest = new FileManifest();
    const materializer = new Materializer(dir, { concurrency: 2 });
    manifest.addText('a.txt', 'a', gen);
    await materializer.flush(manifest, 'generation');

    manifest.addText('b.txt', 'b', pack);
    const second = await materializer.flush(manifest, 'packaging');

    expect(second.written).toEqual(['b.txt']);
    expect(materializer.writtenBy('generation')).toEqual(['a.txt']);
    expect(materializer.writtenBy('packaging')).toEqual(['b.txt']);
    expect(materializer.sizeOf('a.txt')).toBe(1);
  });

  it('should skip pre-existing files unless the entry is an override', async () => {
    writeFileSync(join(dir, 'README.md'), 'mine\n');
    writeFileSync(join(dir, 'LICENSE'), 'old\n');
    const manifest = new FileManifest();
    manifest.addText('README.md', 'generated\n', gen);
    manifest.addText('LICENSE', 'new\n', gen, { override: true });

    const result = await new Materializer(dir).flush(manifest, 'generation');

    expect(result.skipped).toEqual(['README.md']);
    expect(result.warnings).toEqual(['README.md already exists and was not overwritten']);
    expect(readFileSync(join(dir, 'README.md'), 'utf-8')).toBe('mine\n');
    expect(readFileSync(join(dir, 'LICENSE'), 'utf-8')).toBe('new\n');
  });

  it('should rewrite a file this run wrote when a later stage overrides it', async () => {
    const manifest = new FileManifest();
    const materializer = new Materializer(dir);
    manifest.addText('README.md', 'first\n', gen);
    await materializer.flush(manifest, 'generation');

    manifest.addText('README.md', 'second\n', pack, { override: true });
    const result = await materializer.flush(manifest, 'packaging');

    expect(result.written).toEqual(['README.md']);
    expect(readFileSync(join(dir, 'README.md'), 'utf-8')).toBe('second\n');
  });

  it('should raise FileSystemError when the output path is unusable', async () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const manifest = new FileManifest();
    manifest.addText('src/pkg/__init__.py', '', gen);

    const flush = new Materializer(join(blocker, 'out')).flush(manifest, 'generation');

    await expect(flush).rejects.toBeInstanceOf(FileSystemError);
  });

  it('should pass render failures through unchanged', async () => {
    const manifest = new FileManifest();
    manifest.add('broken.py', () => {
      throw new GenerationError('Unresolved placeholder', 'broken.py', 'missing');
    }, gen);

    await expect(new Materializer(dir).flush(manifest, 'generation')).rejects.toBeInstanceOf(GenerationError);
  });

  it('should roll back a stage without touching directories that existed before', async () => {
    mkdirSync(join(dir, 'src'));
    writeFileSync(join(dir, 'src', 'keep.txt'), 'keep');
    const manifest = new FileManifest();
    const materializer = new Materializer(dir);
    manifest.addText('src/pkg/sub/mod.py', 'x', gen);
    manifest.addText('src/pkg/__init__.py', '', gen);
    manifest.addText('setup.cfg', '', pack);
    await materializer.flush(manifest, 'generation');

    const removed = await materializer.rollback('generation');

    expect(removed).toEqual(['setup.cfg', 'src/pkg/__init__.py', 'src/pkg/sub/mod.py']);
    expect(existsSync(join(dir, 'src', 'pkg'))).toBe(false);
    expect(existsSync(join(dir, 'src', 'keep.txt'))).toBe(true);
    expect(existsSync(join(dir, 'setup.cfg'))).toBe(false);
    expect(materializer.writtenBy('generation')).toEqual([]);
  });

  it('should remove directories created for a write that then failed', async () => {
    const manifest = new FileManifest();
    const materializer = new Materializer(dir);
    manifest.add('src/pkg/broken.py', () => {
      throw new Error('disk full');
    }, gen);

    await expect(materializer.flush(manifest, 'generation')).rejects.toBeInstanceOf(FileSystemError);
    expect(existsSync(join(dir, 'src', 'pkg'))).toBe(true);
    expect(materializer.writtenBy('generation')).toEqual([]);
    expect(materializer.touchedBy('generation')).toBe(true);

    expect(await materializer.rollback('generation')).toEqual([]);
    expect(existsSync(join(dir, 'src'))).toBe(false);
    expect(materializer.touchedBy('generation')).toBe(false);
  });
});

