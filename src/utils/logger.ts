import pino from 'pino';
import type { DestinationStream, Level, LevelWithSilent, Logger } from 'pino';

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
  destination?: DestinationStream;
  /** Write synchronously; child processes set this so nothing is lost on exit. */
  sync?: boolean;
}

export class ServiceLogger {
  constructor(private readonly sink: Logger) {}

  static create(options: LoggerOptions = {}): ServiceLogger {
    const destination = options.destination ?? pino.destination({ dest: 2, sync: options.sync ?? false });
    return new ServiceLogger(
      pino(
        {
          name: options.name ?? 'roundtrip',
          level: options.level ?? 'info',
        },
        destination,
      ),
    );
  }

  static silent(): ServiceLogger {
    return new ServiceLogger(pino({ level: 'silent' }));
  }

  get level(): string {
    return this.sink.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.sink.error(message);
      return;
    }

    this.sink.error({ err: error instanceof Error ? error : new Error(String(error)) }, message);
  }

  event(name: string, data: Record<string, unknown>): void {
    this.sink.info({ event: name, ...data }, name);
  }

  child(bindings: Record<string, unknown>): ServiceLogger {
    return new ServiceLogger(this.sink.child(bindings));
  }

  private write(level: Level, message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.sink[level](data, message);
    } else {
      this.sink[level](message);
    }
  }
}
