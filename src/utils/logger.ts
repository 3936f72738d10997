/**
 * Scoped logger writing to stderr; stdout belongs to the frame renderer.
 *
 * Each module takes its own logger (`createLogger('git')`) so a debug trace
 * reads as `[gitfold git debug] apply command="apply --cached -"`. Context
 * fields follow the message as key=value pairs. `debug()` is gated by
 * `setDebug(true)` (from --debug or the config file).
 */

export type LogLevel = 'debug' | 'warn' | 'error';

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, err?: unknown, context?: LogContext): void;
}

type Sink = (line: string) => void;

const stderrSink: Sink = (line) => {
  process.stderr.write(`${line}\n`);
};

let debugEnabled = false;
let sink: Sink = stderrSink;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

/** Redirect log lines; `null` restores stderr. */
export function setSink(next: Sink | null): void {
  sink = next ?? stderrSink;
}

function formatValue(value: string | number | boolean | null): string {
  if (typeof value !== 'string') return String(value);
  return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
}

export function formatContext(context: LogContext = {}): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    pairs.push(`${key}=${formatValue(value)}`);
  }
  return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return '';
}

function emit(scope: string, level: LogLevel, message: string, context?: LogContext): void {
  const stamp = level === 'debug' ? ` ${new Date().toISOString()}` : '';
  sink(`[gitfold ${scope} ${level}${stamp}] ${message}${formatContext(context)}`);
}

export function createLogger(scope: string): Logger {
  return {
    debug(message, context) {
      if (debugEnabled) emit(scope, 'debug', message, context);
    },
    warn(message, context) {
      emit(scope, 'warn', message, context);
    },
    error(message, err, context) {
      const detail = err ? `: ${formatError(err)}` : '';
      emit(scope, 'error', `${message}${detail}`, context);
    },
  };
}
