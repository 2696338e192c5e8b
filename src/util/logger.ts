export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_ORDER, value);

class Logger {
  private level: LogLevel = 'info';

  private readonly scope: string;

  constructor(scope = 'qa-generator') {
    this.scope = scope;
  }

  configure(opts: { level?: LogLevel }): void {
    if (opts.level) {
      this.level = opts.level;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${this.scope}] ${message}${contextStr}`;

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }
}

export const logger = new Logger();
