/**
 * logger.ts — Human-readable progress logger for the scraping pipeline.
 *
 * Every line carries an ISO timestamp, a padded level tag and the module
 * context, e.g.
 *   `[2026-02-10T18:30:00.000Z] [INFO ] [BatchRunner] [2/5] Processing …`
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

/** Set the minimum level emitted by every Logger (`--debug` lowers it). */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('ProfileFetcher');
 *   logger.info('Clicked "View email address", waiting for response…');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Selector attempts, state transitions, poll ticks. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page loaded, field extracted, record flushed. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: consent not dismissed, field missing. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: browser crash, output unwritable. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    // Stack traces only at debug level; the message already names the failure.
    if (err && threshold === 'debug') {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}
