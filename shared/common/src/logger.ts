/**
 * Console-backed logger shared by the Pandora packages.
 *
 * Messages are prefixed with the component name (`[RenderDispatcher] …`).
 * `debug` output is only written when the logger is verbose.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Destination for formatted log lines. Defaults to the global console. */
export interface LogSink {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

export interface LoggerOptions {
  enabled?: boolean;
  verbose?: boolean;
  sink?: LogSink;
}

export class Logger {
  private readonly component: string;
  private readonly enabled: boolean;
  private readonly verbose: boolean;
  private readonly sink: LogSink;

  constructor(component: string, options: LoggerOptions = {}) {
    this.component = component;
    this.enabled = options.enabled ?? true;
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? console;
  }

  /**
   * Returns a logger for a sub-component that shares this logger's settings.
   */
  child(component: string): Logger {
    return new Logger(component, { enabled: this.enabled, verbose: this.verbose, sink: this.sink });
  }

  debug(message: string, ...rest: unknown[]): void {
    if (!this.verbose) return;
    this.write('debug', message, rest);
  }

  info(message: string, ...rest: unknown[]): void {
    this.write('info', message, rest);
  }

  warn(message: string, ...rest: unknown[]): void {
    this.write('warn', message, rest);
  }

  error(message: string, ...rest: unknown[]): void {
    this.write('error', message, rest);
  }

  private write(level: LogLevel, message: string, rest: unknown[]): void {
    if (!this.enabled) return;
    this.sink[level](`[${this.component}] ${message}`, ...rest);
  }
}

/** Logger that drops everything. Used when callers do not pass one. */
export const silentLogger = new Logger('silent', { enabled: false });
