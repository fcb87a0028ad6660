import util from 'node:util';
import winston from 'winston';

const WINSTON_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

type WinstonLevel = (typeof WINSTON_LEVELS)[number];

export type LogLevel = WinstonLevel | 'silent';

export type ContextLogger = winston.Logger;

export interface LoggerServiceOptions {
  level?: string;
  service?: string;
}

const DEFAULT_LOG_LEVEL: WinstonLevel = 'info';

function isWinstonLevel(value: string): value is WinstonLevel {
  return (WINSTON_LEVELS as readonly string[]).includes(value);
}

export function normalizeLevel(level: string | undefined): LogLevel {
  const normalized = (level ?? '').trim().toLowerCase();
  if (normalized === 'silent') {
    return 'silent';
  }
  return isWinstonLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function formatMeta(meta: Record<string, unknown>): string {
  const entries = Object.entries(meta).filter(([key]) => key !== 'service');
  if (entries.length === 0) {
    return '';
  }
  return ` ${util.inspect(Object.fromEntries(entries), { depth: 4, breakLength: 120, colors: false })}`;
}

const consoleFormat = winston.format.printf((info) => {
  const { timestamp, level, message, stack, context, metadata } = info as winston.Logform.TransformableInfo & {
    timestamp?: string;
    stack?: string;
    context?: string;
    metadata?: Record<string, unknown>;
  };
  const contextLabel = context ? `[${context}] ` : '';
  const body = stack ?? String(message);
  return `${timestamp ?? ''} ${level}: ${contextLabel}${body}${formatMeta(metadata ?? {})}`;
});

export class LoggerService {
  private readonly logger: winston.Logger;

  constructor(options: LoggerServiceOptions = {}) {
    const level = normalizeLevel(options.level);

    this.logger = winston.createLogger({
      level: level === 'silent' ? DEFAULT_LOG_LEVEL : level,
      levels: winston.config.npm.levels,
      defaultMeta: { service: options.service ?? 'live-event-ranking' },
      transports: [
        new winston.transports.Console({
          stderrLevels: ['error', 'warn'],
        }),
      ],
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'label', 'context'] }),
        consoleFormat,
      ),
    });
    this.logger.silent = level === 'silent';
  }

  public getLevel(): LogLevel {
    if (this.logger.silent) {
      return 'silent';
    }
    return normalizeLevel(this.logger.level);
  }

  public setLevel(level: string): void {
    const normalized = normalizeLevel(level);
    this.logger.level = normalized === 'silent' ? DEFAULT_LOG_LEVEL : normalized;
    this.logger.silent = normalized === 'silent';
  }

  public forContext(context: string, defaultMeta: Record<string, unknown> = {}): ContextLogger {
    return this.logger.child({ context, ...defaultMeta });
  }

  public close(): void {
    this.logger.close();
  }
}

/** Logger that drops everything; used where no container is around (tests, one-off scripts). */
export function createSilentLogger(context = 'silent'): ContextLogger {
  return new LoggerService({ level: 'silent' }).forContext(context);
}

export default LoggerService;
