import pino from 'pino';
import { homedir } from 'os';
import { join } from 'path';

export interface LoggerOptions {
  name?: string;
  /** Pretty-print to the terminal instead of writing the JSON log file */
  verbose?: boolean;
  level?: string;
  /** Log file used when not verbose */
  file?: string;
}

export const DEFAULT_LOG_FILE = join(homedir(), '.pysmith', 'logs', 'pysmith.log');

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const name = options.name ?? 'pysmith';
  const level = options.level ?? process.env.PYSMITH_LOG_LEVEL ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level: options.level ?? process.env.PYSMITH_LOG_LEVEL ?? 'debug',
      transport: { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } },
    });
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: options.file ?? process.env.PYSMITH_LOG_FILE ?? DEFAULT_LOG_FILE, mkdir: true },
    },
  });
}

let current: pino.Logger | undefined;

export function getLogger(): pino.Logger {
  current ??= createLogger();
  return current;
}

export function setLogger(logger: pino.Logger): void {
  current = logger;
}
