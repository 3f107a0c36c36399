export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = keyof Logger;

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

/**
 * Keeps every message in memory instead of printing it.
 * Used by embedders that collect the checker output themselves, and by the tests.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  log(message: string): void {
    this.entries.push({ level: 'log', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export const defaultLogger = new ConsoleLogger();
