/**
 * Structured logging: one JSON object per line.
 *
 * Entries look like {ts, level, ns, ...fields, msg, data?}. LOG_LEVEL
 * (debug | info | warn | error | silent, default info) is read on every call.
 * Errors go to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;

function isThresholdName(name: string): name is keyof typeof SEVERITY {
  return Object.hasOwn(SEVERITY, name);
}

export function isLevelEnabled(level: LogLevel): boolean {
  const name = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const threshold = isThresholdName(name) ? SEVERITY[name] : SEVERITY.info;
  return SEVERITY[level] >= threshold;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  /** Logger that stamps every entry with the given fields (e.g. a run id) */
  with(fields: Record<string, unknown>): Logger;
}

export function createLogger(namespace: string, fields: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (msg: string, data?: unknown): void => {
    if (!isLevelEnabled(level)) return;
    const entry = { ts: new Date().toISOString(), level, ns: namespace, ...fields, msg, data };
    const sink = level === 'error' ? process.stderr : process.stdout;
    // JSON.stringify drops `data` when it is undefined
    sink.write(`${JSON.stringify(entry)}\n`);
  };

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    with: (extra) => createLogger(namespace, { ...fields, ...extra }),
  };
}
