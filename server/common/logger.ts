type RedactionRule = string | RegExp;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  redactKeys?: RedactionRule[];
  level?: LogLevel;
  scope?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const DEFAULT_REDACT_RULES: RedactionRule[] = [
  'authorization',
  'cookie',
  'x-api-key',
  /api_?key/i,
  /token/i,
  /secret/i,
  /password/i,
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function redact(value: unknown, rules: RedactionRule[]): unknown {
  if (Array.isArray(value)) return value.map((item) => redact(item, rules));
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const shouldRedact = rules.some((r) => (typeof r === 'string' ? r === key.toLowerCase() : r.test(key)));
    out[key] = shouldRedact ? '[REDACTED]' : redact(inner, rules);
  }
  return out;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  switch ((raw || '').toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

export class Logger {
  private redactRules: RedactionRule[];
  private minLevel: LogLevel;
  private scope?: string;

  constructor(options?: LoggerOptions) {
    this.redactRules = options?.redactKeys ?? DEFAULT_REDACT_RULES;
    this.minLevel = options?.level ?? 'info';
    if (options?.scope) this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({
      redactKeys: this.redactRules,
      level: this.minLevel,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private write(level: LogLevel, msg: string, meta?: unknown) {
    if (!this.shouldLog(level)) return;
    const time = new Date().toISOString();
    const payload = meta === undefined ? undefined : redact(meta, this.redactRules);
    const line = {
      time,
      level,
      ...(this.scope ? { scope: this.scope } : {}),
      msg,
      ...(payload === undefined ? {} : { meta: payload }),
    };
    // eslint-disable-next-line no-console
    console[level](JSON.stringify(line));
  }

  debug(msg: string, meta?: unknown) { this.write('debug', msg, meta); }
  info(msg: string, meta?: unknown) { this.write('info', msg, meta); }
  warn(msg: string, meta?: unknown) { this.write('warn', msg, meta); }
  error(msg: string, meta?: unknown) { this.write('error', msg, meta); }
}

export const logger = new Logger({ level: parseLogLevel(process.env.LOG_LEVEL) });

export function createLogger(scope: string): Logger {
  return logger.child(scope);
}
