import { toLatinDigits } from './text.js';

const SAUDI_MOBILE = /^(?:\+966|00966|966|0)?5\d{8}$/;
const PHONE_SHAPED = /(?:\+|00)?\d[\d\s-]{7,15}\d/;

/** Canonical local Saudi mobile format `05XXXXXXXX`, or null when the input is not one. */
export function normalizePhone(raw: string): string | null {
  const compact = toLatinDigits(raw).replace(/[^\d+]/g, '');
  if (!SAUDI_MOBILE.test(compact)) return null;
  let local = compact.replace(/^(?:\+966|00966|966)/, '');
  if (!local.startsWith('0')) local = `0${local}`;
  return local;
}

/** First phone-shaped token in free text, unvalidated. */
export function findPhoneToken(text: string): string | null {
  const match = PHONE_SHAPED.exec(toLatinDigits(text));
  return match ? match[0] : null;
}
