import { readFileSync, existsSync } from 'fs';
import { extname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ProjectConfigSchema, type ProjectConfig, type ProjectConfigInput } from './types.js';
import { ConfigError } from './errors.js';

export type RawConfig = Record<string, unknown>;

const ENV_PREFIX = 'PYSMITH_';

const STRING_ENV: Record<string, string> = {
  PROJECT_NAME: 'projectName',
  PACKAGE_NAME: 'packageName',
  VERSION: 'version',
  DESCRIPTION: 'description',
  AUTHOR: 'author',
  EMAIL: 'email',
  LICENSE: 'license',
  PYTHON_REQUIRES: 'pythonRequires',
  OUTPUT_DIR: 'outputDir',
  TEMPLATE: 'template',
  TEST_FRAMEWORK: 'testFramework',
};

const FLAG_ENV: Record<string, string> = {
  USE_FASTAPI: 'webFramework',
  USE_DOCKER: 'container',
  USE_OPENAI: 'ai',
  USE_GIT: 'git',
  USE_GITHUB_ACTIONS: 'ci',
  CREATE_DOCS: 'docs',
  CREATE_TESTS: 'tests',
};

const DEFAULT_PACKAGE_NAME = 'my_package';

/**
 * Derive an importable package name from a human project name.
 * "My Cool Tool!" -> "my_cool_tool"
 */
export function derivePackageName(projectName: string): string {
  const name = projectName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (!name) return DEFAULT_PACKAGE_NAME;
  return /^[0-9]/.test(name) ? `pkg_${name}` : name;
}

function formatIssues(error: ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and freeze a configuration object. Structural problems (wrong types,
 * missing required fields) raise ConfigError; semantic invariants are left to
 * the validation stage.
 */
export function parseConfig(input: ProjectConfigInput | RawConfig): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, result.error);
  }
  const parsed = result.data;

  const config: ProjectConfig = {
    ...parsed,
    packageName: parsed.packageName ?? derivePackageName(parsed.projectName),
    copyrightYear: parsed.copyrightYear ?? new Date().getFullYear(),
    outputDir: resolve(parsed.outputDir),
  };
  return deepFreeze(config);
}

export class ConfigManager {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- config file <- env vars <- overrides
   */
  load(filePath?: string, overrides?: RawConfig): ProjectConfig {
    let raw: RawConfig = {};

    if (filePath) {
      raw = this.deepMerge(raw, this.readFile(filePath));
    }

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    return parseConfig(raw);
  }

  /**
   * Read a YAML or JSON config file. A top-level `pysmith` section is
   * unwrapped when present.
   */
  readFile(filePath: string): RawConfig {
    if (!existsSync(filePath)) {
      throw new ConfigError(`Configuration file not found: ${filePath}`);
    }

    const ext = extname(filePath).toLowerCase();
    if (!['.yaml', '.yml', '.json'].includes(ext)) {
      throw new ConfigError(`Unsupported config file format: ${ext || '(none)'}`);
    }

    let parsed: unknown;
    try {
      const content = readFileSync(filePath, 'utf-8');
      parsed = ext === '.json' ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse config at ${filePath}`, err instanceof Error ? err : undefined);
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(`Config at ${filePath} must be a mapping`);
    }
    const section = parsed.pysmith;
    return isRecord(section) ? section : parsed;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const result: RawConfig = { ...raw };
    const flags: RawConfig = isRecord(raw.flags) ? { ...raw.flags } : {};

    for (const [suffix, key] of Object.entries(STRING_ENV)) {
      const value = this.env[ENV_PREFIX + suffix];
      if (value !== undefined) result[key] = value;
    }

    for (const [suffix, key] of Object.entries(FLAG_ENV)) {
      const value = this.env[ENV_PREFIX + suffix];
      if (value !== undefined) {
        flags[key] = ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
      }
    }

    const timeout = this.env[`${ENV_PREFIX}PROVIDER_TIMEOUT_MS`];
    if (timeout !== undefined) {
      const ms = Number(timeout);
      if (Number.isNaN(ms)) {
        throw new ConfigError(`${ENV_PREFIX}PROVIDER_TIMEOUT_MS must be a number, got "${timeout}"`);
      }
      result.providerTimeoutMs = ms;
    }

    const required = this.env[`${ENV_PREFIX}REQUIRED_CAPABILITIES`];
    if (required !== undefined) {
      result.requiredCapabilities = required.split(',').map(s => s.trim()).filter(Boolean);
    }

    if (Object.keys(flags).length > 0) {
      result.flags = flags;
    }
    return result;
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const src = source[key];
      const tgt = target[key];
      if (isRecord(src) && isRecord(tgt)) {
        result[key] = this.deepMerge(tgt, src);
      } else {
        result[key] = src;
      }
    }
    return result;
  }
}
