import type { Language } from '../profile/types.js';
import { getLexicon, type Lexicon } from './lexicon.js';

const SAMPLE_CHARS = 1000;
const DOMINANCE_RATIO = 1.5;

export interface LanguageScore {
  en: number;
  es: number;
}

export function countLanguageIndicators(text: string, lexicon: Lexicon = getLexicon()): LanguageScore {
  const sample = text.slice(0, SAMPLE_CHARS).toLowerCase();
  const count = (indicators: string[]) => indicators.filter((phrase) => sample.includes(phrase)).length;
  return {
    en: count(lexicon.languageIndicators.en),
    es: count(lexicon.languageIndicators.es),
  };
}

/**
 * Picks `en` or `es` when one clearly dominates the indicator count over the
 * first 1000 characters; otherwise returns `fallback`. Never throws.
 */
export function detectLanguage(text: string, fallback: Language, lexicon?: Lexicon): Language {
  const { en, es } = countLanguageIndicators(text, lexicon);
  if (es > en * DOMINANCE_RATIO) return 'es';
  if (en > es * DOMINANCE_RATIO) return 'en';
  return fallback;
}
