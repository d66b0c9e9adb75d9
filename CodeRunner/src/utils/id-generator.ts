import { randomUUID } from 'node:crypto';

/** Short id that ties a response to its execution log line */
export function generateExecutionId(): string {
  return `run_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
