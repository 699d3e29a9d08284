// Structured JSON-lines logging: one object per line, `at` names the call site.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  const level = LEVELS.find(l => l === raw) ?? 'info';
  return ORDER[level];
}

export function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? 'error');
}

export function logJson(level: LogLevel, at: string, fields: Record<string, unknown> = {}): void {
  if (ORDER[level] < threshold()) return;
  const line = JSON.stringify({ at, level, ts: new Date().toISOString(), ...fields });
  if (level === 'error' || level === 'warn') console.error(line);
  else console.log(line);
}

export const log = {
  debug: (at: string, fields?: Record<string, unknown>) => logJson('debug', at, fields),
  info: (at: string, fields?: Record<string, unknown>) => logJson('info', at, fields),
  warn: (at: string, fields?: Record<string, unknown>) => logJson('warn', at, fields),
  error: (at: string, fields?: Record<string, unknown>) => logJson('error', at, fields),
};
