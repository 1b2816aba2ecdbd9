import { config } from '../config';

interface LogLevel {
  ERROR: 'error';
  WARN: 'warn';
  INFO: 'info';
  DEBUG: 'debug';
}

export type LogLevelName = keyof LogLevel;

interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  message: string;
  service: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string | undefined;
  };
}

const LEVEL_ORDER: Record<LogLevelName, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

export function parseLogLevel(value: string): LogLevelName {
  const upper = value.trim().toUpperCase();
  return upper === 'ERROR' || upper === 'WARN' || upper === 'INFO' || upper === 'DEBUG' ? upper : 'INFO';
}

export class Logger {
  private serviceName: string;
  private logLevel: LogLevelName = 'INFO';

  constructor(serviceName: string, logLevel: LogLevelName = 'INFO') {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
  }

  private shouldLog(level: LogLevelName): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.logLevel];
  }

  private formatLog(level: LogLevelName, message: string, data?: Record<string, unknown>, error?: Error): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.serviceName,
    };

    if (data) {
      logEntry.data = data;
    }

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack || undefined,
      };
    }

    return logEntry;
  }

  private output(level: LogLevelName, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const line = JSON.stringify(this.formatLog(level, message, data, error));

    switch (level) {
      case 'ERROR':
        console.error(line);
        break;
      case 'WARN':
        console.warn(line);
        break;
      case 'INFO':
        console.log(line);
        break;
      case 'DEBUG':
        console.debug(line);
        break;
    }
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.output('ERROR', message, data, error);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.output('WARN', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.output('INFO', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.output('DEBUG', message, data);
  }

  websocketEvent(event: string, data?: Record<string, unknown>): void {
    this.info(`WebSocket ${event}`, { event, ...data });
  }

  databaseOperation(operation: string, details?: { query?: string; duration?: number; rows?: number }, error?: Error): void {
    const data: Record<string, unknown> = { operation, ...details };

    if (error) {
      this.error(`Database ${operation} failed`, data, error);
    } else {
      this.debug(`Database ${operation} completed`, data);
    }
  }

  healthCheck(component: string, status: 'healthy' | 'unhealthy', details?: Record<string, unknown>): void {
    const data = { component, status, ...details };
    if (status === 'healthy') {
      this.info('Health check passed', data);
    } else {
      this.warn('Health check failed', data);
    }
  }
}

const defaultLevel = parseLogLevel(config.app.logLevel);

export const databaseLogger = new Logger('database', defaultLevel);
export const healthLogger = new Logger('health', defaultLevel);

export function createLogger(serviceName: string, logLevel: LogLevelName = defaultLevel): Logger {
  return new Logger(serviceName, logLevel);
}
