/**
 * Run logger: one formatted line per entry, written to the per-run log file
 * and (filtered by level) to the terminal.
 */

import { createWriteStream, mkdirSync } from 'node:fs';
import type { WriteStream } from 'node:fs';
import { dirname } from 'node:path';
import { describeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, string | number | boolean | null | undefined>;

/** Receives every formatted line at or above its level. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written to the log file. */
  level?: LogLevel;
  /** Log file path; opened in append mode. */
  file?: string;
  /** Terminal-side sink and its minimum level. */
  console?: LogSink;
  consoleLevel?: LogLevel;
  context?: string;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogOutput {
  minLevel: LogLevel;
  write: LogSink;
}

function atLeast(level: LogLevel, min: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(min);
}

export function formatLine(
  timestamp: Date,
  level: LogLevel,
  message: string,
  context?: string,
  data?: LogData,
): string {
  const tag = context ? ` [${context}]` : '';
  let line = `${timestamp.toISOString()} ${level.toUpperCase().padEnd(5)}${tag} ${message}`;
  if (data) {
    const defined = Object.entries(data).filter(([, v]) => v !== undefined);
    if (defined.length > 0) {
      line += ' ' + JSON.stringify(Object.fromEntries(defined));
    }
  }
  return line;
}

export class Logger {
  private readonly outputs: LogOutput[];
  private readonly stream: WriteStream | null;
  private readonly context: string | undefined;

  constructor(options: LoggerOptions = {}, shared?: { outputs: LogOutput[]; stream: WriteStream | null }) {
    this.context = options.context;
    if (shared) {
      this.outputs = shared.outputs;
      this.stream = shared.stream;
      return;
    }

    this.outputs = [];
    this.stream = null;

    if (options.file) {
      this.stream = this.openFile(options.file, options);
    }
    if (options.console) {
      this.outputs.push({ minLevel: options.consoleLevel ?? 'warn', write: options.console });
    }
  }

  /**
   * Open the log file and register it as an output. An open or write error
   * removes the file output and is reported once on the console sink; the
   * run carries on without the file.
   */
  private openFile(file: string, options: LoggerOptions): WriteStream | null {
    const report = (err: unknown) => {
      options.console?.(
        'error',
        formatLine(new Date(), 'error', `Log file unavailable: ${file}`, options.context, {
          error: describeError(err),
        }),
      );
    };

    try {
      mkdirSync(dirname(file), { recursive: true });
    } catch (err) {
      report(err);
      return null;
    }

    const stream = createWriteStream(file, { flags: 'a', encoding: 'utf-8' });
    const output: LogOutput = {
      minLevel: options.level ?? 'info',
      write: (_level, line) => {
        if (stream.writable) stream.write(line + '\n');
      },
    };
    stream.on('error', err => {
      const index = this.outputs.indexOf(output);
      if (index === -1) return;
      this.outputs.splice(index, 1);
      report(err);
    });
    this.outputs.push(output);
    return stream;
  }

  /**
   * A logger tagging its lines with `context`, writing to the same outputs.
   */
  child(context: string): Logger {
    return new Logger({ context }, { outputs: this.outputs, stream: this.stream });
  }

  debug(message: string, data?: LogData): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log('warn', message, data);
  }

  error(message: string, err?: unknown, data?: LogData): void {
    this.log('error', message, err === undefined ? data : { ...data, error: describeError(err) });
  }

  /**
   * Flush and close the log file, if any.
   */
  close(): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.writableEnded || stream.destroyed) return Promise.resolve();
    return new Promise(resolve => {
      stream.end(() => resolve());
    });
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    let line: string | undefined;
    for (const output of this.outputs) {
      if (!atLeast(level, output.minLevel)) continue;
      line ??= formatLine(new Date(), level, message, this.context, data);
      output.write(level, line);
    }
  }
}
