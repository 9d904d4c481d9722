import { randomUUID } from 'node:crypto';

export * from './errors.js';
export { logger, createLogger, type Logger } from './logger.js';

export function generateId(): string {
  return randomUUID();
}
