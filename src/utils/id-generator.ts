import { randomUUID } from 'node:crypto';

/**
 * Vygeneruje unikátní ID (UUID v4).
 */
export function generateId(): string {
  return randomUUID();
}
