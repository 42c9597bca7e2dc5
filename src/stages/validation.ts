/**
 * Validation stage: semantic checks on the parsed configuration. Every
 * violation is collected so the user sees them all at once.
 */

import { readdir, stat } from 'node:fs/promises';
import type { PipelineContext } from '../core/context.js';
import type { ProjectConfig } from '../core/types.js';
import { ValidationError, type Violation } from '../core/errors.js';
import type { TemplateRegistry } from '../templates/registry.js';
import { BaseStage } from './base-stage.js';

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const SEMVER_RE = /^\d+\.\d+\.\d+(?:[-.]?(?:a|b|rc|alpha|beta|dev|post)\.?\d*)?$/;
const SPECIFIER_RE = /^(?:~=|===|==|!=|<=|>=|<|>)\s*\d+(?:\.\d+)*(?:\.\*)?$/;
const REQUIREMENT_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*(?:\[[A-Za-z0-9._,-]+\])?\s*(?:(?:~=|===|==|!=|<=|>=|<|>)\s*[A-Za-z0-9.*+!-]+(?:\s*,\s*(?:~=|===|==|!=|<=|>=|<|>)\s*[A-Za-z0-9.*+!-]+)*)?(?:\s*;.+)?$/;

export const PYTHON_KEYWORDS: ReadonlySet<string> = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
  'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in',
  'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

/** Pure configuration checks; no filesystem access */
export function checkConfig(config: ProjectConfig, templates: TemplateRegistry): Violation[] {
  const violations: Violation[] = [];
  const add = (field: string, message: string) => violations.push({ field, message });

  if (config.projectName.trim().length === 0 || config.projectName.length > 100) {
    add('projectName', 'must be 1 to 100 characters');
  }
  if (!IDENTIFIER_RE.test(config.packageName)) {
    add('packageName', `"${config.packageName}" is not a valid identifier (letters, digits and "_", no leading digit)`);
  } else if (PYTHON_KEYWORDS.has(config.packageName)) {
    add('packageName', `"${config.packageName}" is a reserved keyword`);
  }
  if (!EMAIL_RE.test(config.email)) {
    add('email', `"${config.email}" is not a valid email address`);
  }
  if (!SEMVER_RE.test(config.version)) {
    add('version', `"${config.version}" is not a valid version`);
  }
  const specifiers = config.pythonRequires.split(',').map(s => s.trim());
  if (specifiers.some(s => !SPECIFIER_RE.test(s))) {
    add('pythonRequires', `"${config.pythonRequires}" is not a valid version specifier`);
  }

  for (const [field, list] of [['dependencies', config.dependencies], ['devDependencies', config.devDependencies]] as const) {
    list.forEach((requirement, i) => {
      if (!REQUIREMENT_RE.test(requirement.trim())) {
        add(`${field}[${i}]`, `"${requirement}" is not a valid requirement`);
      }
    });
  }

  const bases = templates.baseTemplates();
  if (!bases.includes(config.template)) {
    add('template', `unknown template "${config.template}" (available: ${bases.join(', ') || 'none'})`);
  }
  return violations;
}

export class ValidationStage extends BaseStage {
  readonly name = 'validation' as const;
  readonly requires = 'nothing';

  precondition(): boolean {
    return true;
  }

  protected async execute(ctx: PipelineContext): Promise<void> {
    const violations = checkConfig(ctx.config, ctx.templates);
    if (violations.length > 0) {
      throw new ValidationError(
        `Invalid configuration: ${violations.map(v => `${v.field}: ${v.message}`).join('; ')}`,
        violations,
        violations[0].field,
      );
    }

    if (await this.hasEntries(ctx.config.outputDir)) {
      ctx.warn(`Output directory ${ctx.config.outputDir} is not empty; existing files are kept unless overridden`);
    }
  }

  private async hasEntries(dir: string): Promise<boolean> {
    const info = await stat(dir).catch(() => undefined);
    if (!info?.isDirectory()) return false;
    const entries = await readdir(dir);
    return entries.length > 0;
  }
}
