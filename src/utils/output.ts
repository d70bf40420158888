import chalk from 'chalk';
import type { ProcessExit } from '../core/command-runner.js';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => visibleLength(r[c] ?? '')));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1 ? cell + ' '.repeat(widths[i] - visibleLength(cell) + columnGap) : cell,
        )
        .join(''),
    )
    .join('\n');
}

function visibleLength(text: string): number {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\u001b\[[0-9;]*m/g, '').length;
}

export function describeExit(exit: ProcessExit): string {
  if (exit.signal) return `was killed by ${exit.signal}`;
  return `exited with code ${exit.code ?? 'unknown'}`;
}
