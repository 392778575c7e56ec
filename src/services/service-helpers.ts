/**
 * Shared service plumbing
 */

import type { ActorContext, AuditEvent, Result } from '@/types/index.js';
import { failure } from '@/types/index.js';

/**
 * Minimal audit dependency shared by the core services
 */
export interface ChangeRecorder {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * Run a service body, turning adapter exceptions into INTERNAL_ERROR
 */
export async function runSafely<T>(
  operation: string,
  fn: () => Promise<Result<T>>
): Promise<Result<T>> {
  try {
    return await fn();
  } catch (err) {
    console.error(`${operation} failed:`, err);
    return failure('INTERNAL_ERROR', `${operation} failed`);
  }
}
