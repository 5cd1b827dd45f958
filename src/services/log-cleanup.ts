import { CallLogStore } from '../store/call-log-store';
import { cleanErrorMessage } from '../utils/error-message';
import { logger } from '../utils/logger';

/** Rewrite every stored error through `cleanErrorMessage`; other fields are untouched. */
export async function cleanupCallLogs(store: CallLogStore): Promise<number> {
  const count = await store.rewrite((entries) =>
    entries.map((entry) => (entry.error ? { ...entry, error: cleanErrorMessage(entry.error) } : entry)),
  );
  logger.info('Call log errors cleaned', { count });
  return count;
}
