/**
 * Leveled console logger used by the merge pipeline and the CLI.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export type LogStream = 'stdout' | 'stderr';

export type LogSink = (stream: LogStream, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  silent?: boolean;
  sink?: LogSink;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
};

const levelTags: Record<LogLevel, string> = {
  debug: '[debug]',
  info: '[info]',
  success: '[ok]',
  warn: '[warn]',
  error: '[error]',
};

const consoleSink: LogSink = (stream, line) => {
  if (stream === 'stderr') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  private level: LogLevel;
  private context: string;
  private silent: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info');
    this.context = options.context ?? '';
    this.silent = options.silent ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  private format(level: LogLevel, message: string): string {
    const ctx = this.context ? ` (${this.context})` : '';
    return `${levelTags[level]}${ctx} ${message}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  private emit(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;
    const stream: LogStream = level === 'warn' || level === 'error' ? 'stderr' : 'stdout';
    this.sink(stream, this.format(level, message));
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  success(message: string): void {
    this.emit('success', message);
  }

  /** Plain output, no tag. Used for previews. */
  log(message: string): void {
    if (!this.silent) {
      this.sink('stdout', message);
    }
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      sink: this.sink,
    });
  }
}

export const createLogger = (context?: string, options?: Omit<LoggerOptions, 'context'>): Logger =>
  new Logger({ ...options, context });
