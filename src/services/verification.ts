import { isRejected, normalizeNumber } from '../numbers/normalizer';
import { cleanNumber } from '../utils/phone';
import { InputError } from '../utils/errors';
import { TelephonyProvider } from './twilio';

export interface VerificationStatus {
  phoneNumber: string;
  isVerified: boolean;
  verifiedNumbers: string[];
  message: string;
}

/** Whether a number, once normalized, is one of the account's verified caller IDs. */
export async function checkVerification(phone: string, telephony: TelephonyProvider): Promise<VerificationStatus> {
  const shape = normalizeNumber(phone, []);
  if (isRejected(shape)) {
    throw new InputError(`Invalid phone number "${phone}": ${shape.detail}`);
  }

  const verifiedNumbers = await telephony.listVerifiedNumbers();
  const normalized = normalizeNumber(phone, verifiedNumbers);
  if (isRejected(normalized)) {
    throw new InputError(`Invalid phone number "${phone}": ${normalized.detail}`);
  }

  const isVerified = verifiedNumbers.some((v) => cleanNumber(v) === normalized.number);
  return {
    phoneNumber: normalized.number,
    isVerified,
    verifiedNumbers,
    message: isVerified
      ? 'Verified'
      : `Number ${normalized.number} is NOT verified. Add it under Verified Caller IDs in the Twilio Console.`,
  };
}
