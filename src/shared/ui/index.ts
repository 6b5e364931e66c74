/**
 * Console output helpers
 */

import chalk from 'chalk';
import { LogManager, type UiLogLevel } from './LogManager.js';

export { LogManager, type UiLogLevel } from './LogManager.js';

export function setLogLevel(level: UiLogLevel): void {
  LogManager.getInstance().setLogLevel(level);
}

export function debug(message: string): void {
  if (!LogManager.getInstance().shouldLog('debug')) return;
  console.log(chalk.gray(`[DEBUG] ${message}`));
}

export function info(message: string): void {
  if (!LogManager.getInstance().shouldLog('info')) return;
  console.log(chalk.blue(message));
}

export function success(message: string): void {
  if (!LogManager.getInstance().shouldLog('info')) return;
  console.log(chalk.green(message));
}

export function warn(message: string): void {
  if (!LogManager.getInstance().shouldLog('warn')) return;
  console.log(chalk.yellow(message));
}

export function error(message: string): void {
  if (!LogManager.getInstance().shouldLog('error')) return;
  console.error(chalk.red(message));
}

export function header(title: string): void {
  if (!LogManager.getInstance().shouldLog('info')) return;
  const rule = '='.repeat(60);
  console.log(chalk.bold.cyan(`\n${rule}\n${title}\n${rule}`));
}

export function status(label: string, value: string): void {
  if (!LogManager.getInstance().shouldLog('info')) return;
  console.log(`${chalk.gray(`${label}:`)} ${chalk.white(value)}`);
}

export function blankLine(): void {
  if (!LogManager.getInstance().shouldLog('info')) return;
  console.log('');
}
