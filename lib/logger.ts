// ============================================================================
// LOGGER
// One JSON line per entry so the output can be ingested as structured logs.
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogData = Record<string, unknown>;

export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export class Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly sink: LogSink = console,
  ) { }

  debug(context: string, message: string, data?: LogData) {
    this.write('debug', context, message, data);
  }

  info(context: string, message: string, data?: LogData) {
    this.write('info', context, message, data);
  }

  warn(context: string, message: string, data?: LogData) {
    this.write('warn', context, message, data);
  }

  error(context: string, message: string, data?: LogData) {
    this.write('error', context, message, data);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(level: LogLevel, context: string, message: string, data?: LogData) {
    if (!this.isEnabled(level)) return;

    const line = formatLine({
      level: level.toUpperCase(),
      context,
      msg: message,
      ...data,
      ts: new Date().toISOString(),
    });

    if (level === 'error') this.sink.error(line);
    else if (level === 'warn') this.sink.warn(line);
    else this.sink.log(line);
  }
}

function formatLine(entry: LogData): string {
  try {
    return JSON.stringify(entry, (_key, value: unknown) => {
      // Errors have no enumerable fields; spell them out.
      if (value instanceof Error) {
        return {
          ...value,
          name: value.name,
          message: value.message,
          stack: value.stack,
        };
      }
      return value;
    });
  } catch {
    return JSON.stringify({ level: entry.level, context: entry.context, msg: entry.msg, ts: entry.ts });
  }
}

/** Logger that drops everything; for tests and embedding. */
export const silentLogger = new Logger('error', {
  log() { },
  warn() { },
  error() { },
});
