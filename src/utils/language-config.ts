import tesseractLanguages from '@/data/tesseract-languages.json';

/**
 * Tesseract language packs, keyed by traineddata identifier (ISO 639-2/T codes).
 */
export const TESSERACT_LANGUAGES: Readonly<Record<string, string>> = tesseractLanguages;

const LANGUAGE_ALIASES: Record<string, string> = {
  chinese: 'chi_sim',
  'chinese-simplified': 'chi_sim',
  'chinese-traditional': 'chi_tra',
  german: 'deu',
  french: 'fra',
  spanish: 'spa',
  japanese: 'jpn',
  korean: 'kor',
  russian: 'rus',
  vietnamese: 'vie',
  dutch: 'nld',
  greek: 'ell',
};

const CODE_PATTERN = /^[a-z]{3}(_[a-z]+)*$/;

function normalizeSingleLanguage(input: string): string | null {
  const normalized = input.toLowerCase().trim();
  if (!normalized) {
    return null;
  }

  if (Object.prototype.hasOwnProperty.call(TESSERACT_LANGUAGES, normalized)) {
    return normalized;
  }

  for (const [code, name] of Object.entries(TESSERACT_LANGUAGES)) {
    if (name.toLowerCase() === normalized) {
      return code;
    }
  }

  const alias = LANGUAGE_ALIASES[normalized];
  if (alias) {
    return alias;
  }

  return CODE_PATTERN.test(normalized) ? normalized : null;
}

/**
 * Normalizes a language name, code, or `+`-joined list of them
 * (e.g. `'English+german'`) to the form `createWorker` expects.
 * Entries that match nothing are dropped; an empty result means English.
 */
export function normalizeTesseractLanguage(input: string): string {
  const codes: string[] = [];
  for (const part of input.split('+')) {
    const code = normalizeSingleLanguage(part);
    if (code && !codes.includes(code)) {
      codes.push(code);
    }
  }

  return codes.length > 0 ? codes.join('+') : 'eng';
}
