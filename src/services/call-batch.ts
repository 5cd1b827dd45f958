import { normalizeCandidates } from '../numbers/normalizer';
import { DispatchResult, RejectedCandidate } from '../types';
import { InputError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';
import { DispatchDeps, dispatchCalls } from './call-dispatcher';

const log = logger.child('call-batch');

export interface BatchOutcome {
  total: number;
  results: DispatchResult[];
  rejected: RejectedCandidate[];
  verifiedLookupFailed: boolean;
}

/**
 * Normalize raw candidates against the account's verified numbers, then
 * dispatch whatever survives. A failed verified-number lookup only costs
 * the country-code hints; the batch still goes out.
 */
export async function runCallBatch(candidates: readonly string[], deps: DispatchDeps): Promise<BatchOutcome> {
  let verified: string[] = [];
  let verifiedLookupFailed = false;
  try {
    verified = await deps.telephony.listVerifiedNumbers();
  } catch (err) {
    verifiedLookupFailed = true;
    log.warn('Verified number lookup failed, continuing without it', { error: errorMessage(err) });
  }

  const { numbers, rejected } = normalizeCandidates(candidates, verified);
  if (rejected.length > 0) {
    log.info('Candidates rejected', { rejected: rejected.map((r) => ({ input: r.input, reason: r.reason })) });
  }
  if (numbers.length === 0) {
    throw new InputError(
      `No valid phone numbers provided (${rejected.map((r) => `${r.input}: ${r.detail}`).join('; ')})`,
    );
  }

  const results = await dispatchCalls(numbers, deps);
  return { total: numbers.length, results, rejected, verifiedLookupFailed };
}
