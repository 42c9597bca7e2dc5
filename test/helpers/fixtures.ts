import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfig } from '../../src/core/config.js';
import type { ProjectConfig, ProjectConfigInput } from '../../src/core/types.js';

export function makeTempDir(prefix = 'pysmith-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function makeConfig(overrides: Partial<ProjectConfigInput> = {}): ProjectConfig {
  return parseConfig({
    projectName: 'Demo Package',
    outputDir: join(tmpdir(), 'pysmith-unused'),
    author: 'Test Author',
    email: 'test@example.com',
    copyrightYear: 2024,
    ...overrides,
  });
}
