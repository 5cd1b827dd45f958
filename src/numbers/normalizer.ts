import { NormalizedNumber, RejectedCandidate } from '../types';
import { cleanNumber, digitsOf, suffixKey } from '../utils/phone';

const DEFAULT_COUNTRY_CODE = '1';
const MIN_DIGITS = 10;
const MIN_QUALIFIED_LENGTH = 11;

export interface NormalizationResult {
  numbers: NormalizedNumber[];
  rejected: RejectedCandidate[];
}

/**
 * First verified number sharing the candidate's last 10 digits and carrying
 * a country code in front of them. Order is the provider's, so ties go to
 * whichever it lists first.
 */
function findVerifiedMatch(key: string, verifiedNumbers: readonly string[]) {
  for (const verified of verifiedNumbers) {
    const digits = digitsOf(verified);
    if (digits.length <= MIN_DIGITS) continue;
    if (digits.slice(-MIN_DIGITS) === key) {
      return { verified, countryCode: digits.slice(0, -MIN_DIGITS) };
    }
  }
  return null;
}

/**
 * Turn one raw candidate into a dialable E.164 number.
 *
 * Already-qualified input (`+` and at least 11 characters) passes through.
 * Anything else is keyed on its last 10 digits: a verified number with the
 * same suffix lends its country code, otherwise `+1` is assumed.
 */
export function normalizeNumber(
  input: string,
  verifiedNumbers: readonly string[],
): NormalizedNumber | RejectedCandidate {
  const cleaned = cleanNumber(input);
  const digits = digitsOf(cleaned);

  if (digits.length < MIN_DIGITS) {
    return {
      input,
      reason: 'too_short',
      detail: `Only ${digits.length} digit${digits.length === 1 ? '' : 's'}, need at least ${MIN_DIGITS}`,
    };
  }

  if (cleaned.startsWith('+') && cleaned.length >= MIN_QUALIFIED_LENGTH) {
    return { input, number: cleaned, resolution: 'qualified' };
  }

  const key = suffixKey(digits);
  const match = findVerifiedMatch(key, verifiedNumbers);
  if (match) {
    return {
      input,
      number: `+${match.countryCode}${key}`,
      resolution: 'verified_match',
      matchedVerified: match.verified,
    };
  }

  return { input, number: `+${DEFAULT_COUNTRY_CODE}${key}`, resolution: 'default_country' };
}

export function isRejected(value: NormalizedNumber | RejectedCandidate): value is RejectedCandidate {
  return 'reason' in value;
}

export function normalizeCandidates(
  candidates: readonly string[],
  verifiedNumbers: readonly string[],
): NormalizationResult {
  const numbers: NormalizedNumber[] = [];
  const rejected: RejectedCandidate[] = [];
  const seen = new Map<string, string>();

  for (const candidate of candidates) {
    const result = normalizeNumber(candidate, verifiedNumbers);
    if (isRejected(result)) {
      rejected.push(result);
      continue;
    }
    const firstInput = seen.get(result.number);
    if (firstInput !== undefined) {
      rejected.push({
        input: candidate,
        reason: 'duplicate',
        detail: `Same number as "${firstInput}" (${result.number})`,
      });
      continue;
    }
    seen.set(result.number, candidate);
    numbers.push(result);
  }

  return { numbers, rejected };
}
