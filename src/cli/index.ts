/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { PysmithError } from '../core/errors.js';
import { createLogger, setLogger } from '../core/logger.js';
import { createGenerateCommand } from './commands/generate.js';
import { createTemplatesCommand } from './commands/templates.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Generate a runnable Python package from one configuration')
    .option('-v, --verbose', 'Pretty-print logs to the terminal')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogger(createLogger({ name: NAME, verbose: true }));
      }
    });

  program.addCommand(createGenerateCommand());
  program.addCommand(createTemplatesCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof PysmithError) {
      console.error(`\n${error.kind}: ${error.message}\n`);
    } else if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`\n${String(error)}\n`);
    }
    process.exitCode = 1;
  }
}
