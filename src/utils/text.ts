const DIACRITICS = /[\u0617-\u061A\u064B-\u0652\u0670]/g;
const TATWEEL = /\u0640/g;
const ARABIC_INDIC_ZERO = 0x0660;
const EXTENDED_INDIC_ZERO = 0x06f0;

const LETTER_MAP: Record<string, string> = {
  'أ': 'ا',
  'إ': 'ا',
  'آ': 'ا',
  'ٱ': 'ا',
  'ى': 'ي',
  'ؤ': 'و',
  'ئ': 'ي',
  'ة': 'ه',
};

export function toLatinDigits(text: string): string {
  return text.replace(/[\u0660-\u0669\u06F0-\u06F9]/g, (d) => {
    const code = d.charCodeAt(0);
    const base = code >= EXTENDED_INDIC_ZERO ? EXTENDED_INDIC_ZERO : ARABIC_INDIC_ZERO;
    return String(code - base);
  });
}

/**
 * Folds Arabic letter variants, strips diacritics and tatweel, maps digits to Latin,
 * lowercases Latin text and collapses whitespace.
 */
export function normalizeText(text: string): string {
  return toLatinDigits(text)
    .replace(DIACRITICS, '')
    .replace(TATWEEL, '')
    .replace(/[أإآٱىؤئة]/g, (ch) => LETTER_MAP[ch] ?? ch)
    .toLowerCase()
    .replace(/[،؛؟?!,;"'()[\]{}]/g, ' ')
    .replace(/\.(?!\d)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

const ARTICLE_PREFIXES = ['وال', 'بال', 'فال', 'كال', 'لل', 'ال'];

/** Drops the Arabic definite article (and its common clitics) from a token. */
export function stripArticle(token: string): string {
  for (const prefix of ARTICLE_PREFIXES) {
    if (token.startsWith(prefix) && token.length - prefix.length >= 2) {
      return token.slice(prefix.length);
    }
  }
  return token;
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(' ')
    .filter(Boolean)
    .map(stripArticle);
}
