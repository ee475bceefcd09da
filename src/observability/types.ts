// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  name?: string;
  namespace?: string;
  operation?: string;
  [key: string]: unknown;
}
