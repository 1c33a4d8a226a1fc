/**
 * Structured logging utility with environment-aware verbosity
 * Replaces ad-hoc console.log statements with consistent, filterable logging
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  component?: string;
  action?: string;
  trackerId?: string;
  generationId?: string;
  [key: string]: unknown;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const value = (raw || '').trim().toLowerCase();
  return LEVELS.find((level) => level === value) ?? fallback;
}

export class Logger {
  constructor(
    private readonly minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
    private readonly defaultContext: LogContext = {},
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(level: LogLevel, message: string, context: LogContext): string {
    const timestamp = new Date().toISOString();
    const component = context.component ? `[${context.component}]` : '';
    const action = context.action ? `[${context.action}]` : '';
    return `${timestamp} ${level.toUpperCase()} ${component}${action} ${message}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) return;

    const merged: LogContext = { ...this.defaultContext, ...context };
    const formattedMessage = this.formatMessage(level, message, merged);
    const { component: _component, action: _action, ...rest } = merged;
    const contextData = Object.keys(rest).length ? rest : undefined;

    switch (level) {
      case 'debug':
        console.debug(formattedMessage, ...(contextData ? [contextData] : []));
        break;
      case 'info':
        console.info(formattedMessage, ...(contextData ? [contextData] : []));
        break;
      case 'warn':
        console.warn(formattedMessage, ...(contextData ? [contextData] : []));
        break;
      case 'error':
        console.error(formattedMessage, ...(contextData ? [contextData] : []), ...(error ? [error] : []));
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with default context
   */
  child(context: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.defaultContext, ...context });
  }
}

// Export singleton instance
export const logger = new Logger();

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
