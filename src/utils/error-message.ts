const ANSI_ESCAPE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;
const BARE_ANSI = /\[[0-9;]*m/g;
const TWILIO_PREAMBLE = 'Twilio returned the following information:';
const CREATE_RECORD = /Unable to create record:[\s\S]*?(?=More information may be available|$)/;

const DEFAULT_MAX_ERROR_LENGTH = 500;

export function stripAnsiCodes(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

function extractCoreMessage(text: string): string {
  const preamble = text.indexOf(TWILIO_PREAMBLE);
  if (preamble !== -1) {
    return text
      .slice(preamble + TWILIO_PREAMBLE.length)
      .replace(BARE_ANSI, '')
      .replace(/More information may be available here:[\s\S]*$/, '')
      .trim()
      .replace(/https?:\/\/\S+$/, '');
  }

  if (text.includes('HTTP Error')) {
    const match = text.match(CREATE_RECORD);
    if (match) return match[0];
  }

  return text;
}

/**
 * Reduce a provider error to one readable line: ANSI codes stripped, the
 * core message pulled out of verbose Twilio output, whitespace collapsed
 * and the result capped at `maxLength` characters. Applying it to its own
 * output changes nothing.
 */
export function cleanErrorMessage(text: string, maxLength = DEFAULT_MAX_ERROR_LENGTH): string {
  // Collapsing whitespace can join a broken escape back together, and stripping
  // one can leave a double space, so repeat until neither changes anything.
  let cleaned = extractCoreMessage(stripAnsiCodes(text));
  for (;;) {
    const next = stripAnsiCodes(cleaned).replace(/\s+/g, ' ').trim();
    if (next === cleaned) break;
    cleaned = next;
  }
  if (cleaned.length <= maxLength) return cleaned;
  return `${cleaned.slice(0, maxLength - 1).trimEnd()}…`;
}
