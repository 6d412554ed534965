import { ensureStreamKvError } from '../errors/streamkv-error.js';
import type { KvLogger } from '../observability/logger.js';

/**
 * Await a store write and report its outcome. On success the changed keys
 * are published; a write that resolves to `false` or rejects resolves to
 * `false`, and a rejection is logged.
 */
export async function commitWrite(
  write: () => Promise<boolean>,
  publish: () => void,
  logger: KvLogger,
  context: Record<string, unknown>
): Promise<boolean> {
  let isSuccessful: boolean;
  try {
    isSuccessful = await write();
  } catch (error) {
    logger.error('Store write failed', ensureStreamKvError(error, 'STREAMKV_S300'), context);
    return false;
  }

  if (!isSuccessful) {
    logger.warn('Store reported an unsuccessful write', context);
    return false;
  }

  logger.debug('Store write committed', context);
  publish();
  return true;
}
