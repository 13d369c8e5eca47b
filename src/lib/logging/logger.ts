export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = {
  write: (line: string) => void;
};

export type LoggerOptions = {
  level?: LogLevel;
  context?: string;
  clock?: () => Date;
};

const levelPriority: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50
};

export const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(`${line}\n`);
  }
};

export const stdoutSink: LogSink = {
  write: (line) => {
    process.stdout.write(`${line}\n`);
  }
};

/**
 * Collects lines in memory. Used by tests and by anything that wants to
 * inspect the run's output after the fact.
 */
export const createMemorySink = (): LogSink & { lines: string[] } => {
  const lines: string[] = [];
  return {
    lines,
    write: (line) => {
      lines.push(line);
    }
  };
};

/**
 * Levelled logger writing `<timestamp> - <LEVEL> - <message>` lines to a sink.
 */
export class Logger {
  private readonly sink: LogSink;
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly clock: () => Date;

  constructor(sink: LogSink, options: LoggerOptions = {}) {
    this.sink = sink;
    this.level = options.level ?? "INFO";
    this.context = options.context ?? "";
    this.clock = options.clock ?? (() => new Date());
  }

  isEnabled(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const text = this.context ? `[${this.context}] ${message}` : message;
    this.sink.write(`${this.clock().toISOString()} - ${level} - ${text}`);
  }

  debug(message: string): void {
    this.log("DEBUG", message);
  }

  info(message: string): void {
    this.log("INFO", message);
  }

  warning(message: string): void {
    this.log("WARNING", message);
  }

  error(message: string): void {
    this.log("ERROR", message);
  }

  critical(message: string): void {
    this.log("CRITICAL", message);
  }

  child(context: string): Logger {
    return new Logger(this.sink, {
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      clock: this.clock
    });
  }
}
