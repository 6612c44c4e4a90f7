// engine/log.ts
// Structured single-line JSON logs for the dashboard handlers.

import { SERVICE_NAME } from './constants';

export function logInfo(event: string, ctx: Record<string, unknown> = {}): void {
  console.info(JSON.stringify({ level: 'info', service: SERVICE_NAME, event, ...ctx }));
}

export function logWarn(event: string, ctx: Record<string, unknown> = {}): void {
  console.warn(JSON.stringify({ level: 'warn', service: SERVICE_NAME, event, ...ctx }));
}

export function logError(event: string, ctx: Record<string, unknown> = {}): void {
  console.error(JSON.stringify({ level: 'error', service: SERVICE_NAME, event, ...ctx }));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
