import type { Interruption } from '../types/schema';

export const DEFAULT_BLOCK_STATUS = 403;

/**
 * Maps an interruption to the response status. An explicit deny uses its own status
 * (403 when unset); every other action is policy-defined and gets `defaultStatus`.
 */
export function statusFromInterruption(it: Interruption, defaultStatus: number = DEFAULT_BLOCK_STATUS): number {
  if (it.action === 'deny') {
    return it.status !== 0 ? it.status : DEFAULT_BLOCK_STATUS;
  }
  return defaultStatus;
}
