import { getLexicon, mentionedTechnologies, normalizeTerm, termMatches, type Lexicon } from './lexicon.js';

export const MIN_USABLE_BULLETS = 2;

/** Adapted output that would state facts the profile does not contain. */
export class FidelityViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FidelityViolation';
  }
}

export interface BulletScrubResult {
  kept: string[];
  dropped: { bullet: string; technologies: string[] }[];
}

/**
 * Drops bullets naming a lexicon technology that is neither in the
 * experience's technology set nor already mentioned by its source text.
 */
export function scrubBullets(
  bullets: readonly string[],
  allowedTechnologies: readonly string[],
  sourceText: string,
  lexicon: Lexicon = getLexicon(),
): BulletScrubResult {
  const allowed = new Set(allowedTechnologies.map(normalizeTerm));
  for (const term of mentionedTechnologies(sourceText, lexicon)) {
    allowed.add(normalizeTerm(term));
  }
  const allowedList = [...allowed];

  const kept: string[] = [];
  const dropped: BulletScrubResult['dropped'] = [];
  for (const bullet of bullets) {
    const foreign = mentionedTechnologies(bullet, lexicon).filter((term) => {
      const key = normalizeTerm(term);
      // an allowed "AWS Lambda" also covers "AWS"
      return !allowed.has(key) && !allowedList.some((a) => termMatches(term, a));
    });
    if (foreign.length > 0) {
      dropped.push({ bullet, technologies: foreign });
    } else {
      kept.push(bullet);
    }
  }
  return { kept, dropped };
}

/**
 * Scrubbed bullets, or FidelityViolation when fewer than two survive and the
 * caller should use the original achievements instead.
 */
export function guardBullets(
  bullets: readonly string[],
  allowedTechnologies: readonly string[],
  sourceText: string,
  lexicon?: Lexicon,
): string[] {
  const { kept, dropped } = scrubBullets(bullets, allowedTechnologies, sourceText, lexicon);
  if (kept.length < MIN_USABLE_BULLETS) {
    const named = [...new Set(dropped.flatMap((d) => d.technologies))];
    throw new FidelityViolation(
      `Only ${kept.length} usable bullet(s) after scrubbing${named.length ? ` (removed mentions of ${named.join(', ')})` : ''}`,
    );
  }
  return kept;
}

/**
 * Keeps only skills the profile lists, spelled as the profile spells them,
 * in the order the model returned them.
 */
export function restrictSkills(candidates: readonly string[], profileSkills: readonly string[]): string[] {
  const bySpelling = new Map(profileSkills.map((skill) => [normalizeTerm(skill), skill]));
  const out: string[] = [];
  const seen = new Set<string>();
  for (const candidate of candidates) {
    const key = normalizeTerm(candidate);
    const canonical = bySpelling.get(key);
    if (canonical && !seen.has(key)) {
      seen.add(key);
      out.push(canonical);
    }
  }
  return out;
}
