import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const debugEnabled = options.debug ?? false;

  return {
    debug(message) {
      if (!debugEnabled) return;
      write(chalk.dim(`[pdfbox] ${message}`));
    },
    info(message) {
      write(`${chalk.blue('[pdfbox]')} ${message}`);
    },
    warn(message) {
      write(`${chalk.yellow('[pdfbox] WARNING:')} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
};
