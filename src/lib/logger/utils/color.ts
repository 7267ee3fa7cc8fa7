import chalk from 'chalk';
import type { LogType } from '../types';

type ColoredLogType = Exclude<LogType, 'raw'>;

const painters: Record<ColoredLogType, (text: string) => string> = {
  error: (text) => chalk.red(text),
  info: (text) => chalk.white(text),
  warn: (text) => chalk.yellow(text),
  success: (text) => chalk.green(text),
  notice: (text) => chalk.blue(text),
  debug: (text) => chalk.gray(text),
};

export function colorize(type: ColoredLogType, text: string): string {
  return painters[type](text);
}
