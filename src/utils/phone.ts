/**
 * Reduce a phone number to digits plus an optional leading `+`.
 * A `+` anywhere but the first non-space character is dropped.
 */
export function cleanNumber(phone: string): string {
  const trimmed = phone.trim();
  const digits = trimmed.replace(/\D/g, '');
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

export function digitsOf(phone: string): string {
  return phone.replace(/\D/g, '');
}

/** Last 10 digits, the key used to match numbers across country codes. */
export function suffixKey(phone: string): string {
  return digitsOf(phone).slice(-10);
}
