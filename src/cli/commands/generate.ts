/**
 * `pysmith generate [config-file]`: run the generation pipeline
 */

import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import { ConfigManager, type RawConfig } from '../../core/config.js';
import { Orchestrator } from '../../core/orchestrator.js';
import { formatReport } from '../../core/report.js';
import { formatDuration } from '../../utils/timer.js';

export interface GenerateOptions {
  output?: string;
  name?: string;
  packageName?: string;
  template?: string;
  templatesDir?: string;
  web?: boolean;
  docker?: boolean;
  ai?: boolean;
  git: boolean;
  tests: boolean;
  docs: boolean;
  buildImage?: boolean;
  require: string[];
  json?: boolean;
  report?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createGenerateCommand(): Command {
  const cmd = new Command('generate');

  cmd
    .description('Generate a Python package')
    .argument('[config-file]', 'YAML or JSON configuration file')
    .option('-o, --output <dir>', 'Output directory')
    .option('-n, --name <name>', 'Project name')
    .option('--package-name <name>', 'Import name of the package')
    .option('-t, --template <template>', 'Base template (see `pysmith templates`)')
    .option('--templates-dir <dir>', 'Directory of custom descriptors loaded on top of the built-ins')
    .option('--web', 'Add a FastAPI application')
    .option('--docker', 'Add container files')
    .option('--ai', 'Add an OpenAI client and an AI-written overview')
    .option('--build-image', 'Build the container image after generation')
    .option('--no-git', 'Do not initialize a git repository')
    .option('--no-tests', 'Do not generate tests')
    .option('--no-docs', 'Do not generate documentation')
    .option('--require <capability>', 'Fail when this capability is unavailable (repeatable)', collect, [])
    .option('--json', 'Print the report as JSON')
    .option('--report <file>', 'Also write the JSON report to a file')
    .action(async (configFile: string | undefined, options: GenerateOptions) => {
      await executeGenerate(configFile, options);
    });

  return cmd;
}

/** Only options the user actually passed become overrides */
export function toOverrides(options: GenerateOptions): RawConfig {
  const overrides: RawConfig = {};
  const flags: RawConfig = {};

  if (options.output) overrides.outputDir = options.output;
  if (options.name) overrides.projectName = options.name;
  if (options.packageName) overrides.packageName = options.packageName;
  if (options.template) overrides.template = options.template;
  if (options.require.length > 0) overrides.requiredCapabilities = options.require;
  if (options.buildImage) overrides.options = { buildImage: true };

  if (options.web) flags.webFramework = true;
  if (options.docker) flags.container = true;
  if (options.ai) flags.ai = true;
  if (!options.git) flags.git = false;
  if (!options.tests) flags.tests = false;
  if (!options.docs) flags.docs = false;

  if (Object.keys(flags).length > 0) overrides.flags = flags;
  return overrides;
}

async function executeGenerate(configFile: string | undefined, options: GenerateOptions): Promise<void> {
  const config = new ConfigManager().load(configFile, toOverrides(options));
  const orchestrator = new Orchestrator({ templatesDir: options.templatesDir });

  const controller = new AbortController();
  const onSignal = () => {
    console.log('\nCancelling after the current stage...');
    controller.abort();
  };
  process.once('SIGINT', onSignal);

  if (!options.json) {
    orchestrator.events.on('stage:start', ({ stage }) => {
      console.log(`→ ${stage}`);
    });
    orchestrator.events.on('stage:complete', ({ stage, result }) => {
      console.log(`  ${stage} ${result.status} (${formatDuration(result.duration)})`);
    });
    orchestrator.events.on('stage:skipped', ({ stage, reason }) => {
      console.log(`- ${stage} skipped: ${reason}`);
    });
  }

  try {
    const report = await orchestrator.run(config, { signal: controller.signal });

    if (options.report) {
      await writeFile(options.report, JSON.stringify(report, null, 2) + '\n', 'utf-8');
    }

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log('');
      console.log(formatReport(report));
    }

    if (report.status !== 'succeeded') {
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onSignal);
  }
}
