import { randomUUID } from 'node:crypto';

/**
 * Fresh correlation id for a submitted request (UUID v4).
 */
export function newCorrelationId(): string {
  return randomUUID();
}
