/**
 * Structured component logger for the exergy engine.
 *
 * Every line carries an ISO timestamp, the level and the component name.
 * Output is text by default or JSON lines when EXERGY_LOG_JSON=1. warn/error go
 * to stderr, everything else to stdout.
 *
 * Environment (read on every emit, so tests can stub it per case):
 *   EXERGY_LOG_LEVEL = debug|info|warn|error|silent (default: info)
 *   EXERGY_LOG_JSON  = 1 (default: text)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, string | number | boolean | null | undefined>;

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLevelName(candidate: string): candidate is LogLevel | 'silent' {
  return candidate in LEVEL_ORDER;
}

function minimumLevel(): number {
  const raw = (process.env.EXERGY_LOG_LEVEL ?? 'info').toLowerCase();
  return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

// ── Core emit ─────────────────────────────────────────────────────────────────

function emit(level: LogLevel, component: string, message: string, data?: LogData): void {
  if (LEVEL_ORDER[level] < minimumLevel()) return;

  const ts = new Date().toISOString();
  let line: string;
  if (process.env.EXERGY_LOG_JSON === '1') {
    const entry: Record<string, string | LogData> = { ts, level, component, msg: message };
    if (data) entry.data = data;
    line = JSON.stringify(entry);
  } else {
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    line = data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
  }

  if (level === 'warn' || level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

// ── Logger interface ──────────────────────────────────────────────────────────

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(component: string): Logger;
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, data) => emit('debug', component, msg, data),
    info: (msg, data) => emit('info', component, msg, data),
    warn: (msg, data) => emit('warn', component, msg, data),
    error: (msg, data) => emit('error', component, msg, data),
    child: (sub) => createLogger(`${component}:${sub}`),
  };
}
