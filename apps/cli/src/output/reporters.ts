import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// Human-readable output. With --json, stdout carries only the JSON document
// and everything written through here moves to stderr.
let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function write(text: string): void {
  (jsonMode ? console.error : console.log)(text);
}

type Status = 'success' | 'warning' | 'error' | 'info';

// Resolved per call so a changed chalk.level takes effect
const STATUS_MARKS: Record<Status, () => string> = {
  success: () => chalk.green('✓'),
  warning: () => chalk.yellow('!'),
  error: () => chalk.red('✗'),
  info: () => chalk.blue('i'),
};

function status(kind: Status, message: string): void {
  write(`${STATUS_MARKS[kind]()} ${message}`);
}

export const success = (message: string) => status('success', message);
export const warning = (message: string) => status('warning', message);
export const error = (message: string) => status('error', message);
export const info = (message: string) => status('info', message);

/** Progress indicator for file discovery and checking. Callers stop it on every path. */
export function spinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    stream: jsonMode ? process.stderr : process.stdout,
  }).start();
}

/** A stylesheet path or section title, underlined. */
export function header(title: string): void {
  write('');
  write(chalk.bold(title));
  write(chalk.dim('─'.repeat(title.length)));
}

export function newline(): void {
  write('');
}

export function keyValue(key: string, value: string, indent = 0): void {
  write(`${'  '.repeat(indent)}${chalk.dim(`${key}:`)} ${value}`);
}

/** Preformatted text such as a diagnostic list or a style table. */
export function block(text: string): void {
  write(text);
}
