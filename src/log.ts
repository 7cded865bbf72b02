/**
 * Scoped stderr diagnostics: `[client] retrying in 2000ms attempt=2`.
 *
 * Threshold is process-wide (set once from config/flags); TOOLRELAY_QUIET=1 mutes everything.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type Sink = (line: string) => void;

let threshold: LogLevel = 'warn';
let muted = false;
let sink: Sink = (line) => process.stderr.write(line + '\n');

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function setLoggerMuted(value: boolean): void {
  muted = value;
}

/** Redirect output (tests). Returns the previous sink. */
export function setLogSink(next: Sink): Sink {
  const prev = sink;
  sink = next;
  return prev;
}

/** Apply `verbose` and the TOOLRELAY_QUIET env switch. */
export function configureLogging(opts: { verbose?: boolean }): void {
  setLogLevel(opts.verbose ? 'debug' : 'warn');
  setLoggerMuted(process.env.TOOLRELAY_QUIET === '1');
}

function formatData(data?: Record<string, unknown>): string {
  if (!data) return '';
  const parts: string[] = [];
  for (const [k, v] of Object.entries(data)) {
    if (v === undefined) continue;
    const s = typeof v === 'string' ? v : JSON.stringify(v);
    parts.push(`${k}=${/\s/.test(s) ? JSON.stringify(s) : s}`);
  }
  return parts.length ? ' ' + parts.join(' ') : '';
}

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
};

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>) => {
    if (muted || LEVELS[level] < LEVELS[threshold]) return;
    const tag = level === 'debug' || level === 'info' ? `[${scope}]` : `[${scope}] ${level}:`;
    sink(`${tag} ${msg}${formatData(data)}`);
  };
  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
  };
}
