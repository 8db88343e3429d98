// Frontend logger. Writes to the console and keeps the recent entries in memory
// so the in-app LogViewer can display them.

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
}

type LogListener = (entry: LogEntry) => void;

const MAX_ENTRIES = 500;

class FrontendLogger {
  private entries: LogEntry[] = [];
  private listeners = new Set<LogListener>();

  constructor(private readonly name: string) {}

  private record(level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      logger: this.name,
      message,
    };
    this.entries = [...this.entries, entry].slice(-MAX_ENTRIES); // Keep last 500 logs
    this.listeners.forEach((listener) => listener(entry));
  }

  private logToConsole(level: LogLevel, message: string, ...args: unknown[]) {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, ...args);
        break;
      case 'info':
        console.info(prefix, message, ...args);
        break;
      case 'warning':
        console.warn(prefix, message, ...args);
        break;
      case 'error':
        console.error(prefix, message, ...args);
        break;
    }
    this.record(level, message);
  }

  debug(message: string, ...args: unknown[]) {
    this.logToConsole('debug', message, ...args);
  }

  info(message: string, ...args: unknown[]) {
    this.logToConsole('info', message, ...args);
  }

  warning(message: string, ...args: unknown[]) {
    this.logToConsole('warning', message, ...args);
  }

  error(message: string, ...args: unknown[]) {
    this.logToConsole('error', message, ...args);
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  clear() {
    this.entries = [];
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export const logger = new FrontendLogger('email-parser');
