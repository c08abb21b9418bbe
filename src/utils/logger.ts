type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SENSITIVE_KEYS = ['password', 'token', 'authorization', 'cookie', 'secret', 'key', 'credential'];

export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map(redact);
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lower = key.toLowerCase();
    if (SENSITIVE_KEYS.some((k) => lower.includes(k))) {
      out[key] = '[REDACTED]';
    } else {
      out[key] = redact(value);
    }
  }
  return out;
}

function isRecord(obj: unknown): obj is Record<string, unknown> {
  return obj !== null && typeof obj === 'object' && !Array.isArray(obj);
}

function isLevel(value: string): value is Level {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (raw === 'silent') return Infinity;
  if (isLevel(raw)) return LEVEL_ORDER[raw];
  return process.env.NODE_ENV === 'test' ? Infinity : LEVEL_ORDER.info;
}

function write(level: Level, message: string, fields: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  const line = JSON.stringify({ time: new Date().toISOString(), level, message, ...fields });
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

function metaFields(meta?: Record<string, unknown>): Record<string, unknown> {
  if (!meta) return {};
  const clean = redact(meta);
  return isRecord(clean) && Object.keys(clean).length > 0 ? { meta: clean } : {};
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    write('debug', message, metaFields(meta));
  },
  info(message: string, meta?: Record<string, unknown>): void {
    write('info', message, metaFields(meta));
  },
  warn(message: string, meta?: Record<string, unknown>): void {
    write('warn', message, metaFields(meta));
  },
  error(message: string, err?: unknown, meta?: Record<string, unknown>): void {
    const fields: Record<string, unknown> = metaFields(meta);
    if (err !== undefined) fields.error = err instanceof Error ? err.message : String(err);
    if (err instanceof Error && err.stack) fields.stack = err.stack;
    write('error', message, fields);
  },
};
