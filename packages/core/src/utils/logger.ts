/**
 * ロガーユーティリティ
 *
 * 出力先 (LogSink) を差し替えられるので、テストでは出力を配列に集められる。
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Where formatted log lines end up. `console` satisfies this shape.
 */
export type LogSink = {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
};

type LoggerConfig = {
  level: LogLevel;
  sink?: LogSink;
};

export class Logger {
  private config: LoggerConfig;
  private sink: LogSink;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.sink = config.sink ?? console;
  }

  info(message: string): void {
    this.sink.log(`[INFO] ${message}`);
  }

  warn(message: string): void {
    this.sink.warn(`[WARN] ${message}`);
  }

  error(message: string): void {
    this.sink.error(`[ERROR] ${message}`);
  }

  debug(message: string): void {
    if (this.config.level === 'debug') {
      this.sink.debug(`[DEBUG] ${message}`);
    }
  }
}

/**
 * Keeps every formatted line in memory
 */
export class MemorySink implements LogSink {
  readonly lines: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  warn(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.lines.push(message);
  }

  debug(message: string): void {
    this.lines.push(message);
  }
}
