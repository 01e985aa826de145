export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Where log lines end up
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Logging surface used by the provisioner
 */
export interface ProvisionLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}

export class Logger implements ProvisionLogger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private sink: LogSink = consoleSink,
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    if (this.level <= LogLevel.DEBUG) {
      this.sink.out(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.level <= LogLevel.INFO) {
      this.sink.out(message);
    }
  }

  warn(message: string): void {
    if (this.level <= LogLevel.WARN) {
      this.sink.err(`[WARN] ${message}`);
    }
  }

  error(message: string): void {
    if (this.level <= LogLevel.ERROR) {
      this.sink.err(`[ERROR] ${message}`);
    }
  }

  /**
   * Print a success message (always shown)
   */
  success(message: string): void {
    this.sink.out(`✓ ${message}`);
  }

  /**
   * Print a failure message (always shown)
   */
  fail(message: string): void {
    this.sink.out(`✗ ${message}`);
  }

  /**
   * Print a heading underlined to its width
   */
  section(title: string): void {
    this.sink.out(title);
    this.sink.out("=".repeat(title.length));
  }

  /**
   * Print lines as-is (always shown)
   */
  print(...lines: string[]): void {
    for (const line of lines) {
      this.sink.out(line);
    }
  }
}

export const logger = new Logger();
