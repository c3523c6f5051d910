import type { PrivacyConfig } from '../config/index.js';

export const MASKED = '[MASKED]';

function maskCardNumber(value: string): string {
  return `XXXX-XXXX-XXXX-${value.slice(-4)}`;
}

/**
 * Returns a shallow copy of `data` with personal fields replaced, card numbers
 * reduced to their last four digits and long payment values cut to a prefix.
 */
export function maskPii(data: Readonly<Record<string, unknown>>, privacy: PrivacyConfig): Record<string, unknown> {
  const piiFields = new Set(privacy.piiFields);
  const paymentFields = new Set(privacy.paymentFields);
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (piiFields.has(key)) {
      masked[key] = MASKED;
    } else if (key === 'card_number' && typeof value === 'string' && value.length > 4) {
      masked[key] = maskCardNumber(value);
    } else if (paymentFields.has(key) && typeof value === 'string' && value.length > 8) {
      masked[key] = `${value.slice(0, 4)}...${MASKED}`;
    } else {
      masked[key] = value;
    }
  }
  return masked;
}
