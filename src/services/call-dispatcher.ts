import { CallLogStore } from '../store/call-log-store';
import { CallLogEntry, CallMessage, DispatchResult, NormalizedNumber } from '../types';
import { cleanErrorMessage } from '../utils/error-message';
import { ProviderError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { TelephonyProvider } from './twilio';

const log = logger.child('dispatcher');

export interface DispatchDeps {
  telephony: TelephonyProvider;
  store: CallLogStore;
  from: string;
  message: CallMessage;
  now?: () => Date;
}

/**
 * Readable form of a provider failure. Trial accounts reject unverified
 * destinations, so those get a pointer to the fix.
 */
export function describeProviderError(err: ProviderError): string {
  const message = cleanErrorMessage(err.message);
  const lower = message.toLowerCase();
  if (!lower.includes('verified')) return message;

  if (lower.includes('source phone number')) {
    return `${message} | Fix: set TWILIO_PHONE_NUMBER to a number purchased in Twilio (purchased numbers are verified automatically)`;
  }
  const destination = message.match(/\+?\d{10,}/);
  if (destination) {
    return `${message} | Action required: verify the destination number ${destination[0]} under Verified Caller IDs in the Twilio Console (trial accounts can only call verified numbers)`;
  }
  return `${message} | Tip: trial accounts can only call numbers listed under Verified Caller IDs in the Twilio Console`;
}

async function attemptCall(target: NormalizedNumber, deps: DispatchDeps): Promise<CallLogEntry> {
  const timestamp = () => (deps.now ?? (() => new Date()))().toISOString();
  try {
    const { sid } = await deps.telephony.placeCall({
      from: deps.from,
      to: target.number,
      message: deps.message,
    });
    return { number: target.number, status: 'completed-initiated', timestamp: timestamp(), sid };
  } catch (err) {
    const error = err instanceof ProviderError ? describeProviderError(err) : cleanErrorMessage(errorMessage(err));
    log.warn('Call attempt failed', { number: target.number, error });
    return { number: target.number, status: 'failed', timestamp: timestamp(), error };
  }
}

/**
 * Place calls one at a time, in order. Each attempt yields one log entry,
 * and neither a failed call nor a failed log write stops the rest of the
 * batch.
 */
export async function dispatchCalls(
  targets: readonly NormalizedNumber[],
  deps: DispatchDeps,
): Promise<DispatchResult[]> {
  const results: DispatchResult[] = [];

  for (const target of targets) {
    const entry = await attemptCall(target, deps);
    let persisted = true;
    try {
      await deps.store.append(entry);
    } catch (err) {
      persisted = false;
      log.error('Failed to record call log entry', { number: entry.number, sid: entry.sid, error: errorMessage(err) });
    }
    results.push({ ...entry, persisted });
  }

  log.info('Batch dispatched', {
    total: results.length,
    initiated: results.filter((r) => r.status === 'completed-initiated').length,
    failed: results.filter((r) => r.status === 'failed').length,
  });
  return results;
}
