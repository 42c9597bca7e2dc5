import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createCLI } from '../../../src/cli/index.js';
import { createGenerateCommand, toOverrides, type GenerateOptions } from '../../../src/cli/commands/generate.js';
import { createTemplatesCommand } from '../../../src/cli/commands/templates.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

const defaults: GenerateOptions = { git: true, tests: true, docs: true, require: [] };

describe('generate command', () => {
  it('should produce no overrides for default options', () => {
    expect(toOverrides(defaults)).toEqual({});
  });

  it('should map passed options onto configuration fields', () => {
    const overrides = toOverrides({
      ...defaults,
      output: './out',
      name: 'Demo',
      template: 'cli_tool',
      web: true,
      docker: true,
      git: false,
      docs: false,
      buildImage: true,
      require: ['version-control'],
    });

    expect(overrides).toEqual({
      outputDir: './out',
      projectName: 'Demo',
      template: 'cli_tool',
      requiredCapabilities: ['version-control'],
      options: { buildImage: true },
      flags: { webFramework: true, container: true, git: false, docs: false },
    });
  });

  it('should register the generate and templates commands', () => {
    expect(createCLI().commands.map(c => c.name())).toEqual(['generate', 'templates']);
  });

  it('should accept a custom templates directory without turning it into configuration', () => {
    const cmd = createGenerateCommand();

    expect(cmd.options.map(o => o.long)).toContain('--templates-dir');
    expect(toOverrides({ ...defaults, templatesDir: './custom' })).toEqual({});
  });
});

describe('templates command', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    mkdirSync(join(dir, 'snippets'));
    writeFileSync(join(dir, 'minimal.yaml'), 'name: minimal\nkind: base\ndescription: Bare package\nstructure:\n  README.md: hello\n');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('should list custom descriptors next to the built-ins', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await createTemplatesCommand().parseAsync(['--json', '--templates-dir', dir], { from: 'user' });

    expect(log).toHaveBeenCalledTimes(1);
    const listed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(listed).toContainEqual({
      name: 'minimal',
      version: '1.0.0',
      kind: 'base',
      phase: 'generation',
      description: 'Bare package',
      when: [],
      features: [],
    });
  });
});
