import { randomUUID } from 'node:crypto';

/** Random v4 UUID, used for entity ids and token jti values. */
export function generateId(): string {
  return randomUUID();
}
