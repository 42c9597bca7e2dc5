/**
 * `pysmith templates`: list the available descriptors
 */

import { Command } from 'commander';
import { TemplateRegistry } from '../../templates/registry.js';

export interface TemplatesOptions {
  json?: boolean;
  templatesDir?: string;
}

export function createTemplatesCommand(): Command {
  const cmd = new Command('templates');

  cmd
    .description('List template descriptors')
    .option('--json', 'Output as JSON')
    .option('--templates-dir <dir>', 'Also list the descriptors in this directory')
    .action((options: TemplatesOptions) => {
      const registry = TemplateRegistry.load(undefined, options.templatesDir);
      const descriptors = registry.list();

      if (options.json) {
        console.log(JSON.stringify(
          descriptors.map(({ name, version, kind, phase, description, when, features }) => ({
            name, version, kind, phase, description, when, features,
          })),
          null,
          2,
        ));
        return;
      }

      for (const d of descriptors) {
        const when = d.when.length > 0 ? ` when ${d.when.join(' & ')}` : '';
        console.log(`${d.name.padEnd(12)} ${d.kind.padEnd(8)} ${d.phase.padEnd(14)} ${d.description}${when}`);
      }
    });

  return cmd;
}
