import { readFileSync } from 'node:fs';
import { z } from 'zod';

const LexiconSchema = z.object({
  technologies: z.array(z.string().min(1)),
  languageIndicators: z.object({
    en: z.array(z.string().min(1)),
    es: z.array(z.string().min(1)),
  }),
  rolePatterns: z.object({
    en: z.array(z.string().min(1)),
    es: z.array(z.string().min(1)),
  }),
  seniority: z.object({
    principal: z.array(z.string()),
    lead: z.array(z.string()),
    senior: z.array(z.string()),
    mid: z.array(z.string()),
    junior: z.array(z.string()),
  }),
  requirementKeywords: z.array(z.string().min(1)),
  experiencePatterns: z.array(z.string().min(1)),
  industryTags: z.record(z.string(), z.array(z.string().min(1))),
  stopWords: z.array(z.string()),
  roleSynonyms: z.array(z.array(z.string().min(1)).min(1)),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

let cached: Lexicon | null = null;

/** Keyword tables used by language detection, heuristic extraction and role matching. */
export function getLexicon(): Lexicon {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../data/lexicon.json', import.meta.url), 'utf-8'));
    cached = LexiconSchema.parse(raw);
  }
  return cached;
}

const WORD_CHAR = '[\\p{L}\\p{N}+#]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

const termPatterns = new Map<string, RegExp>();

function termPattern(term: string, caseSensitive: boolean): RegExp {
  const key = `${caseSensitive ? 'c' : 'i'}:${term}`;
  let pattern = termPatterns.get(key);
  if (!pattern) {
    pattern = new RegExp(
      `(?<!${WORD_CHAR})${escapeRegExp(term.trim())}(?!${WORD_CHAR})`,
      caseSensitive ? 'u' : 'iu',
    );
    termPatterns.set(key, pattern);
  }
  return pattern;
}

/**
 * Whole-token, case-insensitive containment: `python` matches
 * `Python/FastAPI`, `java` does not match `JavaScript`.
 */
export function termMatches(term: string, text: string): boolean {
  if (!term.trim()) return false;
  return termPattern(term, false).test(text);
}

/** Index of the first whole-token occurrence of `term`, or -1. */
export function termIndex(term: string, text: string, caseSensitive = false): number {
  if (!term.trim()) return -1;
  const match = termPattern(term, caseSensitive).exec(text);
  return match ? match.index : -1;
}

export function normalizeTerm(term: string): string {
  return term.trim().toLowerCase();
}

function normalizeTag(tag: string): string {
  return normalizeTerm(tag).replace(/[-_\s]+/g, ' ');
}

/**
 * True when a profile tag names the job's industry tag, directly or through
 * one of the phrases the lexicon lists for it (`fintech` counts as `finance`).
 */
export function industryTagMatches(jobTag: string, entityTag: string, lexicon: Lexicon = getLexicon()): boolean {
  const job = normalizeTag(jobTag);
  const own = normalizeTag(entityTag);
  if (job === own) return true;
  const phrases = Object.hasOwn(lexicon.industryTags, job) ? lexicon.industryTags[job] : undefined;
  return phrases?.some((phrase) => normalizeTag(phrase) === own) ?? false;
}

/** Case-insensitive de-duplication keeping the first spelling seen. */
export function dedupeTerms(terms: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const term of terms) {
    const trimmed = term.trim();
    const key = normalizeTerm(trimmed);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(trimmed);
  }
  return out;
}

/** Lower-cased word tokens, hyphenated words kept whole. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}+#-]+/u)
    .map((t) => t.replace(/^-+|-+$/g, ''))
    .filter(Boolean);
}

/**
 * Role tokens with stop words dropped and synonyms (across both languages)
 * folded onto the first word of their group.
 */
export function canonicalRoleTokens(role: string, lexicon: Lexicon = getLexicon()): Set<string> {
  const stop = new Set(lexicon.stopWords);
  const canonical = new Map<string, string>();
  for (const group of lexicon.roleSynonyms) {
    for (const word of group) canonical.set(word.toLowerCase(), group[0] ?? word);
  }
  const tokens = new Set<string>();
  for (const token of tokenize(role)) {
    if (stop.has(token) || token.length < 2) continue;
    tokens.add(canonical.get(token) ?? token);
  }
  return tokens;
}

/**
 * Lexicon technologies mentioned in `text`, ordered by first occurrence.
 * Terms of two characters or fewer (`Go`, `AI`) must match case exactly.
 */
export function mentionedTechnologies(text: string, lexicon: Lexicon = getLexicon()): string[] {
  const found: { term: string; index: number }[] = [];
  for (const term of lexicon.technologies) {
    const index = termIndex(term, text, term.trim().length <= 2);
    if (index >= 0) found.push({ term, index });
  }
  found.sort((a, b) => a.index - b.index);
  return dedupeTerms(found.map((f) => f.term));
}
