import { describe, it, expect } from 'vitest';
import { normalizeTesseractLanguage, TESSERACT_LANGUAGES } from '../src/utils/language-config';

describe('normalizeTesseractLanguage', () => {
  it('returns the code if a valid code is provided', () => {
    expect(normalizeTesseractLanguage('eng')).toBe('eng');
    expect(normalizeTesseractLanguage('fra')).toBe('fra');
    expect(normalizeTesseractLanguage('chi_sim')).toBe('chi_sim');
  });

  it('returns the code if a language name is provided', () => {
    expect(normalizeTesseractLanguage('English')).toBe('eng');
    expect(normalizeTesseractLanguage('FRENCH')).toBe('fra');
    expect(normalizeTesseractLanguage('Chinese - Simplified')).toBe('chi_sim');
  });

  it('handles common aliases', () => {
    expect(normalizeTesseractLanguage('Chinese')).toBe('chi_sim');
    expect(normalizeTesseractLanguage('German')).toBe('deu');
  });

  it('passes through strings that look like codes', () => {
    expect(normalizeTesseractLanguage('que')).toBe('que');
    expect(normalizeTesseractLanguage('chr_inv')).toBe('chr_inv');
  });

  it('normalizes each entry of a combined language list', () => {
    expect(normalizeTesseractLanguage('English+german')).toBe('eng+deu');
    expect(normalizeTesseractLanguage('eng+ENG+fra')).toBe('eng+fra');
    expect(normalizeTesseractLanguage('deu+unknown-language')).toBe('deu');
  });

  it('defaults to eng for unknown or empty input', () => {
    expect(normalizeTesseractLanguage('unknown-language')).toBe('eng');
    expect(normalizeTesseractLanguage('')).toBe('eng');
    expect(normalizeTesseractLanguage('+')).toBe('eng');
  });

  it('handles whitespace', () => {
    expect(normalizeTesseractLanguage('  English  ')).toBe('eng');
    expect(normalizeTesseractLanguage('eng + fra')).toBe('eng+fra');
  });
});

describe('TESSERACT_LANGUAGES', () => {
  it('contains more than 100 languages', () => {
    expect(Object.keys(TESSERACT_LANGUAGES).length).toBeGreaterThan(100);
    expect(TESSERACT_LANGUAGES.eng).toBe('English');
  });
});
