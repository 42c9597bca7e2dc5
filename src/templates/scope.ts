import type { ProjectConfig } from '../core/types.js';
import type { Condition, TemplateDescriptor } from './types.js';

export const FLAG_NAMES = [
  'web_framework', 'container', 'ai', 'git', 'ci', 'docs', 'tests', 'pytest', 'unittest',
] as const;

export type FlagName = typeof FLAG_NAMES[number];

export interface TemplateScope {
  vars: Readonly<Record<string, string>>;
  flags: Readonly<Record<FlagName, boolean>>;
}

export function isFlagName(name: string): name is FlagName {
  return (FLAG_NAMES as readonly string[]).includes(name);
}

/** Split `!flag` into its name and polarity */
export function parseFlagRef(ref: string): { flag: string; negated: boolean } {
  const negated = ref.startsWith('!');
  return { flag: negated ? ref.slice(1) : ref, negated };
}

export function conditionTerms(condition: Condition | undefined): string[] {
  if (condition === undefined) return [];
  return Array.isArray(condition) ? condition : [condition];
}

export function evaluateCondition(condition: Condition | undefined, flags: TemplateScope['flags']): boolean {
  return conditionTerms(condition).every(term => {
    const { flag, negated } = parseFlagRef(term);
    const value = isFlagName(flag) ? flags[flag] : false;
    return negated ? !value : value;
  });
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export interface PackageRequirements {
  dependencies: string[];
  devDependencies: string[];
}

/**
 * Union of descriptor requirements in application order, followed by the
 * extras named in the configuration.
 */
export function collectRequirements(config: ProjectConfig, descriptors: TemplateDescriptor[]): PackageRequirements {
  return {
    dependencies: unique([...descriptors.flatMap(d => d.dependencies), ...config.dependencies]),
    devDependencies: unique([...descriptors.flatMap(d => d.devDependencies), ...config.devDependencies]),
  };
}

export function buildScope(config: ProjectConfig, requirements: PackageRequirements): TemplateScope {
  const { flags } = config;
  return {
    vars: {
      package_name: config.packageName,
      project_name: config.projectName,
      version: config.version,
      description: config.description,
      author: config.author,
      email: config.email,
      license: config.license,
      python_requires: config.pythonRequires,
      copyright_year: String(config.copyrightYear),
      test_framework: config.testFramework,
      entry_module: config.template === 'cli_tool' ? 'cli' : 'main',
      dependencies_list: requirements.dependencies.map(d => `    "${d}",`).join('\n'),
      dev_dependencies_list: requirements.devDependencies.map(d => `    "${d}",`).join('\n'),
      requirements_txt: requirements.dependencies.join('\n'),
      dev_requirements_txt: requirements.devDependencies.join('\n'),
    },
    flags: {
      web_framework: flags.webFramework,
      container: flags.container,
      ai: flags.ai,
      git: flags.git,
      ci: flags.ci,
      docs: flags.docs,
      tests: flags.tests,
      pytest: config.testFramework === 'pytest',
      unittest: config.testFramework === 'unittest',
    },
  };
}
