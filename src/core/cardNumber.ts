/** Number of leading digits sent to the BIN lookup. */
export const BIN_LENGTH = 6;

const MAX_CARD_NUMBER_LENGTH = 19;

/** Strips everything but digits and caps the length. */
export function sanitizeCardNumber(value: string): string {
  return value.replace(/\D/g, '').slice(0, MAX_CARD_NUMBER_LENGTH);
}

/** Groups digits by four, e.g. `4111 1111 1111 1111`. */
export function formatCardNumber(value: string): string {
  return sanitizeCardNumber(value).replace(/(\d{4})(?=\d)/g, '$1 ');
}

/** Leading digits of the card number, shorter while the shopper is still typing. */
export function binOf(value: string): string {
  return sanitizeCardNumber(value).slice(0, BIN_LENGTH);
}

/** Best local guess of the card brand from its first digits. */
export function detectCardBrand(number: string): string {
  const clean = sanitizeCardNumber(number);
  if (/^(636368|438935|504175|451416|636297)/.test(clean) || /^(5067|4576|4011)/.test(clean)) return 'elo';
  if (/^606282/.test(clean)) return 'hipercard';
  if (/^4/.test(clean)) return 'visa';
  if (/^(5[1-5]|2[2-7])/.test(clean)) return 'mc';
  if (/^3[47]/.test(clean)) return 'amex';
  if (/^(6011|65|64[4-9])/.test(clean)) return 'discover';
  if (/^35/.test(clean)) return 'jcb';
  return '';
}
