import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? 'info').toLowerCase();
  return normalized === 'debug' || normalized === 'warn' || normalized === 'error' ? normalized : 'info';
}

const CURRENT_LOG_LEVEL = parseLevel(process.env.LOG_LEVEL);

// File output is opt-in; console output is always on
const LOG_DIR = process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null;
let logDirReady = false;

export interface LogMeta {
  correlationId?: string;
  eventId?: string;
  channel?: string;
  threadTs?: string;
  userId?: string;
  stage?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function appendToFile(entry: Record<string, unknown>): void {
  if (!LOG_DIR) return;

  try {
    if (!logDirReady) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
      logDirReady = true;
    }
    const dateStr = new Date().toISOString().split('T')[0];
    fs.appendFileSync(path.join(LOG_DIR, `slack-${dateStr}.log`), JSON.stringify(entry) + '\n');
  } catch (err) {
    console.error('[SlackLogger] Failed to write to log file:', err);
  }
}

export function writeLog(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[CURRENT_LOG_LEVEL]) return;

  appendToFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta
  });

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  writeLog('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  writeLog('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  writeLog('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  writeLog('debug', message, meta);
}

export interface RequestLoggerContext {
  eventId?: string;
  channel?: string;
  threadTs?: string;
  userId?: string;
}

/**
 * Per-event logger. Every line carries the same correlation id so one
 * event's trail can be followed through concurrent deliveries.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private context: RequestLoggerContext;
  private stages: Map<string, number> = new Map();

  constructor(context: RequestLoggerContext = {}) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.context = { ...context };
  }

  /** Adds fields learned after construction, e.g. the channel once the event is parsed */
  bind(context: RequestLoggerContext): void {
    this.context = { ...this.context, ...context };
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      ...this.context,
      duration: Date.now() - this.startTime,
      ...extra
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
