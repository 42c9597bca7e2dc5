import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { GenerationStage } from '../../../src/stages/generation.js';
import { TestingStage, topLevelModules } from '../../../src/stages/testing.js';
import { DocumentationStage, moduleNames, renderApiDoc } from '../../../src/stages/documentation.js';
import { PackagingStage } from '../../../src/stages/packaging.js';
import type { PipelineContext } from '../../../src/core/context.js';
import type { ProjectConfigInput } from '../../../src/core/types.js';
import type { ProviderRegistration } from '../../../src/providers/types.js';
import { MockProvider, registrationFor } from '../../helpers/mock-provider.js';
import { makeConfig, makeTempDir, removeDir } from '../../helpers/fixtures.js';
import { makeContext } from '../../helpers/context.js';

describe('stage helpers', () => {
  it('should find public top-level modules of the package', () => {
    const paths = [
      'src/pkg/__init__.py',
      'src/pkg/__main__.py',
      'src/pkg/core.py',
      'src/pkg/api/routes.py',
      'src/pkg/py.typed',
      'src/other/x.py',
      'tests/test_core.py',
    ];
    expect(topLevelModules(paths, 'pkg')).toEqual(['core']);
  });

  it('should list dotted module names', () => {
    expect(moduleNames(['src/pkg/__init__.py', 'src/pkg/api/__init__.py', 'src/pkg/api/app.py', 'README.md']))
      .toEqual(['pkg', 'pkg.api', 'pkg.api.app']);
  });

  it('should render the API index', () => {
    expect(renderApiDoc('Demo', ['pkg', 'pkg.core'])).toBe('# Demo API\n\nModules:\n\n- `pkg`\n- `pkg.core`\n');
  });
});

describe('concrete stages', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  async function generated(overrides: Partial<ProjectConfigInput> = {}, providers: ProviderRegistration[] = []): Promise<PipelineContext> {
    const ctx = makeContext(makeConfig({ packageName: 'demo_pkg', outputDir: dir, ...overrides }), providers);
    ctx.record(await new GenerationStage().run(ctx));
    return ctx;
  }

  it('should write the source tree during generation', async () => {
    const ctx = await generated();
    const [result] = ctx.results;

    expect(result).toMatchObject({ name: 'generation', status: 'succeeded', filesAdded: 5 });
    expect(readFileSync(join(dir, 'src/demo_pkg/__init__.py'), 'utf-8')).toContain('__version__ = "0.1.0"');
  });

  it('should add one smoke test per module and report test counts', async () => {
    const runner = new MockProvider('pytest', ['test-runner'], () => ({
      ok: false,
      output: '3 passed, 1 failed',
      data: { passed: 3, failed: 1 },
    }));
    const ctx = await generated({}, [registrationFor(runner)]);

    const result = await new TestingStage().run(ctx);

    expect(result.status).toBe('succeeded');
    expect(result.warnings).toEqual(['3 passed, 1 failed']);
    expect(ctx.manifest.addedBy('testing').map(e => e.path)).toEqual([
      'tests/__init__.py',
      'tests/conftest.py',
      'tests/test_core.py',
      'tests/test_main.py',
      'tests/test_utils.py',
    ]);
    expect(readFileSync(join(dir, 'tests/test_core.py'), 'utf-8')).toBe([
      'import importlib',
      '',
      '',
      'def test_core_imports():',
      '    module = importlib.import_module("demo_pkg.core")',
      '    assert module is not None',
      '',
    ].join('\n'));
    expect(runner.calls).toEqual([{ action: 'run-tests', cwd: dir }]);
  });

  it('should write unittest classes for the unittest framework', async () => {
    const ctx = await generated({ testFramework: 'unittest' });
    await new TestingStage().run(ctx);

    expect(ctx.manifest.has('tests/conftest.py')).toBe(false);
    expect(ctx.manifest.readText('tests/test_utils.py')).toContain('class TestUtils(unittest.TestCase):');
  });

  it('should write docs and an API index of the generated modules', async () => {
    const ctx = await generated();
    const result = await new DocumentationStage().run(ctx);

    expect(result.status).toBe('succeeded');
    expect(ctx.manifest.addedBy('documentation').map(e => e.path)).toEqual([
      'CHANGELOG.md', 'LICENSE', 'README.md', 'docs/api.md',
    ]);
    expect(readFileSync(join(dir, 'docs/api.md'), 'utf-8')).toBe(
      '# Demo Package API\n\nModules:\n\n- `demo_pkg`\n- `demo_pkg.core`\n- `demo_pkg.main`\n- `demo_pkg.utils`\n',
    );
    expect(readFileSync(join(dir, 'LICENSE'), 'utf-8')).toMatch(/^MIT License\n\nCopyright \(c\) 2024 Test Author\n/);
  });

  it('should add an AI overview when the ai capability answers', async () => {
    const ai = new MockProvider('mock-ai', ['ai'], () => ({ ok: true, output: 'An overview.  ' }));
    const ctx = await generated({ flags: { ai: true } }, [registrationFor(ai)]);

    const result = await new DocumentationStage().run(ctx);

    expect(result.status).toBe('succeeded');
    expect(readFileSync(join(dir, 'docs/overview.md'), 'utf-8')).toBe('An overview.\n');
    expect(ai.calls[0].params?.prompt).toContain('Python package named "demo_pkg"');
  });

  it('should degrade documentation when the ai capability is missing', async () => {
    const ctx = await generated({ flags: { ai: true } });
    const result = await new DocumentationStage().run(ctx);

    expect(result.status).toBe('degraded');
    expect(existsSync(join(dir, 'README.md'))).toBe(true);
    expect(existsSync(join(dir, 'docs/overview.md'))).toBe(false);
  });

  it('should write packaging files and initialize the repository', async () => {
    const git = new MockProvider('git', ['version-control']);
    const ctx = await generated({}, [registrationFor(git)]);

    const result = await new PackagingStage().run(ctx);

    expect(result.status).toBe('succeeded');
    expect(existsSync(join(dir, 'pyproject.toml'))).toBe(true);
    expect(git.calls).toEqual([{
      action: 'init-repository',
      cwd: dir,
      params: { message: 'Initial commit of Demo Package' },
    }]);
  });

  it('should only build an image when asked to', async () => {
    const docker = new MockProvider('docker', ['container'], () => ({ ok: true, output: '', data: { tag: 'demo_pkg:0.1.0' } }));
    const flags = { container: true, git: false };

    await new PackagingStage().run(await generated({ flags }, [registrationFor(docker)]));
    expect(docker.calls).toEqual([]);

    removeDir(dir);
    await new PackagingStage().run(await generated({ flags, options: { buildImage: true } }, [registrationFor(docker)]));
    expect(docker.calls).toEqual([{
      action: 'build-image',
      cwd: dir,
      params: { tag: 'demo_pkg:0.1.0' },
    }]);
  });

  it('should compensate by removing exactly the stage files', async () => {
    const ctx = await generated();
    const removed = await new GenerationStage().compensate(ctx);

    expect(removed).toHaveLength(5);
    expect(existsSync(join(dir, 'src'))).toBe(false);
  });
});
