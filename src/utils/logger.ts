import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  level?: LogLevel;
  logPath?: string;
  silent?: boolean;
};

export type LogEntry = {
  ts: string;
  level: LogLevel;
  event: string;
  payload?: Record<string, unknown>;
};

export class AppLogger {
  private readonly minWeight: number;
  private readonly logPath?: string;
  private readonly silent: boolean;
  private readonly sink?: (entry: LogEntry) => void;

  constructor(config: LoggerConfig = {}, sink?: (entry: LogEntry) => void) {
    this.minWeight = LEVEL_WEIGHT[config.level ?? 'info'];
    this.silent = config.silent ?? false;
    this.sink = sink;
    if (config.logPath) {
      this.logPath = config.logPath;
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    }
  }

  debug(event: string, payload?: Record<string, unknown>): void {
    this.write('debug', event, payload);
  }

  info(event: string, payload?: Record<string, unknown>): void {
    this.write('info', event, payload);
  }

  warn(event: string, payload?: Record<string, unknown>): void {
    this.write('warn', event, payload);
  }

  error(event: string, payload?: Record<string, unknown>): void {
    this.write('error', event, payload);
  }

  private write(level: LogLevel, event: string, payload?: Record<string, unknown>): void {
    if (LEVEL_WEIGHT[level] < this.minWeight) {
      return;
    }
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...(payload ? { payload } : {}),
    };
    this.sink?.(entry);
    if (this.silent) {
      return;
    }
    const line = `${JSON.stringify(entry)}\n`;
    if (this.logPath) {
      fs.appendFileSync(this.logPath, line, 'utf8');
    }
    if (level === 'error' || level === 'warn') {
      console.error(line.trim());
    } else {
      console.log(line.trim());
    }
  }
}

export const createSilentLogger = (sink?: (entry: LogEntry) => void): AppLogger =>
  new AppLogger({ level: 'debug', silent: true }, sink);
