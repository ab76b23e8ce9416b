/**
 * Structured Logger
 *
 * Provides consistent, structured logging across all components.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  enableStructured: boolean;
  onLog?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  component: 'anchorlog',
  enableConsole: true,
  enableStructured: false,
};

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Create a scoped logger instance
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Create a child logger with a new component name
   */
  child(component: string): Logger {
    return new Logger({
      ...this.config,
      component: `${this.config.component}.${component}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorInfo = error ? {
      name: error.name,
      message: error.message,
      code: errorCode(error),
      stack: error.stack,
    } : undefined;

    this.log('error', message, context, errorInfo);
  }

  /**
   * Create a log group for related operations
   */
  group(name: string): LogGroup {
    return new LogGroup(this, name);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LogEntry['error']
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      context,
      error,
    };

    if (this.config.onLog) {
      this.config.onLog(entry);
    }

    if (this.config.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    if (this.config.enableStructured) {
      const output = JSON.stringify(entry);
      switch (entry.level) {
        case 'error':
          console.error(output);
          break;
        case 'warn':
          console.warn(output);
          break;
        default:
          console.log(output);
      }
      return;
    }

    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.component}]`;
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    const message = `${prefix} ${entry.message}${contextStr}`;

    switch (entry.level) {
      case 'error':
        console.error(message);
        if (entry.error?.stack) {
          console.error(entry.error.stack);
        }
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'debug':
        console.debug(message);
        break;
      default:
        console.log(message);
    }
  }
}

/**
 * Times the named steps of a multi-step operation, such as the phases of a
 * sync, and logs one summary line when it ends
 */
export class LogGroup {
  private logger: Logger;
  private name: string;
  private startTime: number;
  private steps: Array<{ name: string; duration: number; success: boolean }> = [];

  constructor(logger: Logger, name: string) {
    this.logger = logger;
    this.name = name;
    this.startTime = performance.now();
    this.logger.debug(`Starting: ${name}`);
  }

  /**
   * Run one step. A step fails when it throws or when `isClean` rejects its
   * result; the result is returned either way.
   */
  async step<T>(name: string, fn: () => Promise<T>, isClean: (result: T) => boolean = () => true): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.record(name, start, isClean(result));
      return result;
    } catch (error) {
      this.record(name, start, false);
      throw error;
    }
  }

  end(): void {
    const duration = Math.round(performance.now() - this.startTime);
    const steps = Object.fromEntries(this.steps.map((step) => [step.name, step.duration]));
    const failedSteps = this.steps.filter((step) => !step.success).map((step) => step.name);

    if (failedSteps.length === 0) {
      this.logger.info(`Completed: ${this.name}`, { duration, steps });
    } else {
      this.logger.warn(`Completed with issues: ${this.name}`, { duration, steps, failedSteps });
    }
  }

  private record(name: string, start: number, success: boolean): void {
    this.steps.push({ name, duration: Math.round(performance.now() - start), success });
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get or create the default logger
 */
export function getLogger(component?: string): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({ level: 'info', component: 'anchorlog' });
  }
  return component ? defaultLogger.child(component) : defaultLogger;
}
