import { CommandResolution, CommandResolver } from './types';

const DIGIT_RUN = /\d{10,}/;
const CALL_ALL = /\b(start calling|call all|call every(one|body)|dial all)\b/i;

/** Deterministic fallback: a 10+ digit run means one call, "call all" phrasing means the list. */
export class KeywordCommandResolver implements CommandResolver {
  readonly name = 'keywords';

  async attempt(text: string): Promise<CommandResolution> {
    const digits = text.match(DIGIT_RUN);
    if (digits) {
      return { kind: 'resolved', action: { type: 'call_one', number: digits[0] } };
    }
    if (CALL_ALL.test(text)) {
      return { kind: 'resolved', action: { type: 'call_all' } };
    }
    return { kind: 'not_handled', reason: 'No phone number or call-all phrase found' };
  }
}
