// src/core/logger.ts
import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append JSON lines to this file */
  file?: string;
  /** Replaces stderr; used by tests to capture output */
  destination?: DestinationStream;
}

/**
 * Logger owned by a single download call. Created when the call starts and
 * closed (flushed) when it ends.
 */
export class RunLogger {
  private fileStream?: ReturnType<typeof pino.destination>;

  private constructor(
    private readonly logger: PinoLogger,
    fileStream?: ReturnType<typeof pino.destination>
  ) {
    this.fileStream = fileStream;
  }

  static create(options: LoggerOptions = {}): RunLogger {
    const level = options.level ?? 'info';
    const streams: pino.StreamEntry[] = [
      { level: 'debug', stream: options.destination ?? process.stderr },
    ];

    let fileStream: ReturnType<typeof pino.destination> | undefined;
    if (options.file) {
      fileStream = pino.destination({ dest: options.file, mkdir: true, sync: true });
      streams.push({ level: 'debug', stream: fileStream });
    }

    const logger = pino(
      {
        level,
        base: { service: 'docsnap' },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label) => ({ level: label }),
        },
      },
      pino.multistream(streams)
    );

    return new RunLogger(logger, fileStream);
  }

  child(component: string, context: LogContext = {}): RunLogger {
    return new RunLogger(this.logger.child({ component, ...context }));
  }

  debug(message: string, context: LogContext = {}): void {
    this.logger.debug(context, message);
  }

  info(message: string, context: LogContext = {}): void {
    this.logger.info(context, message);
  }

  warn(message: string, context: LogContext = {}): void {
    this.logger.warn(context, message);
  }

  error(message: string, context: LogContext & { error?: unknown } = {}): void {
    const { error, ...rest } = context;
    if (error instanceof Error) {
      this.logger.error({ ...rest, err: { name: error.name, message: error.message, stack: error.stack } }, message);
      return;
    }
    if (error !== undefined) {
      this.logger.error({ ...rest, err: { message: String(error) } }, message);
      return;
    }
    this.logger.error(rest, message);
  }

  close(): void {
    if (this.fileStream) {
      this.fileStream.flushSync();
      this.fileStream.end();
      this.fileStream = undefined;
    }
  }
}

export function createLogger(options: LoggerOptions = {}): RunLogger {
  return RunLogger.create(options);
}

/** Discards everything. Handy for library callers and tests. */
export function silentLogger(): RunLogger {
  return RunLogger.create({ level: 'silent' });
}
