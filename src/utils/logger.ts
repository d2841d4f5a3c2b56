import { pino } from 'pino';

import { config } from '@config/env.config.js';

type Meta = Record<string, unknown>;

const base = pino({
  level: config.LOG_LEVEL,
  base: { service: 'voice-table-reservations' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

function write(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: Meta): void {
  if (meta) base[level](meta, message);
  else base[level](message);
}

export const logger = {
  debug: (message: string, meta?: Meta) => write('debug', message, meta),
  info: (message: string, meta?: Meta) => write('info', message, meta),
  warn: (message: string, meta?: Meta) => write('warn', message, meta),
  error: (message: string, meta?: Meta) => write('error', message, meta),
};

/** Keeps the last four digits only. */
export function maskPhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  if (digits.length <= 4) return '****';
  return `***${digits.slice(-4)}`;
}
