/**
 * PartnerPin extraction
 *
 * Both ledgers carry the join key inside free text, e.g.
 * "Payout ref PIN12345678901" or "12345678901 ". The key is the run of
 * digits at the very end of the text, ignoring trailing punctuation and
 * whitespace, and it only counts when that run is exactly 11 digits long.
 */

import { PARTNER_PIN_LENGTH } from './constants';
import type { PartnerPin } from './types';

const PIN_PATTERN = new RegExp(`^\\d{${PARTNER_PIN_LENGTH}}$`);

/**
 * Type guard for an already-extracted key.
 */
export function isPartnerPin(value: string): value is PartnerPin {
  return PIN_PATTERN.test(value);
}

/**
 * Extracts the trailing 11-digit PartnerPin from a text field.
 *
 * A longer or shorter trailing run yields null; the run is never truncated
 * or padded and the rest of the text is never searched.
 *
 * @example
 * extractPartnerPin('Transfer PIN12345678901')   // '12345678901'
 * extractPartnerPin('Ref 12345678901 / ')        // '12345678901'
 * extractPartnerPin('PIN1234567890')             // null (10 digits)
 * extractPartnerPin('PIN123456789012')           // null (12 digits)
 */
export function extractPartnerPin(text: string): PartnerPin | null {
  let end = text.length;
  while (end > 0 && !isDigit(text[end - 1])) {
    end--;
  }

  let start = end;
  while (start > 0 && isDigit(text[start - 1])) {
    start--;
  }

  const run = text.slice(start, end);
  return isPartnerPin(run) ? run : null;
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

export default extractPartnerPin;
