import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';
export type LogContext = Record<string, unknown>;

const LOGS_DIR = process.env.LOGS_DIR || './logs';
const LOGS_FILE = path.join(LOGS_DIR, 'logs.txt');
const ERRORS_FILE = path.join(LOGS_DIR, 'errors.txt');

function ensureDir(): void {
  if (!fs.existsSync(LOGS_DIR)) {
    fs.mkdirSync(LOGS_DIR, { recursive: true });
  }
}

function timestamp(): string {
  return new Date().toISOString();
}

function writeLog(file: string, line: string): void {
  ensureDir();
  fs.appendFileSync(file, line + '\n', 'utf-8');
}

/** Short one-line description of anything thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

export function formatLine(level: LogLevel, msg: string, context?: LogContext, at: string = timestamp()): string {
  const ctx = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${at}] ${level} ${msg}${ctx}`;
}

function write(level: LogLevel, msg: string, context?: LogContext): string {
  const line = formatLine(level, msg, context);
  if (level === 'ERROR') {
    console.error(line);
  } else {
    console.log(line);
  }
  writeLog(LOGS_FILE, line);
  return line;
}

export const logger = {
  info(msg: string, context?: LogContext): void {
    write('INFO', msg, context);
  },

  warn(msg: string, context?: LogContext): void {
    write('WARN', msg, context);
  },

  error(msg: string, err?: unknown, context?: LogContext): void {
    const line = write('ERROR', msg, err === undefined ? context : { ...context, error: describeError(err) });
    const lines: string[] = ['---', line];
    if (err instanceof Error && err.stack) {
      lines.push(err.stack);
    }
    lines.push('---');
    writeLog(ERRORS_FILE, lines.join('\n'));
  },
};
