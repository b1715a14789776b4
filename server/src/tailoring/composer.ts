/**
 * Document Composer: profile + ranked experiences + adapted slots in,
 * ComposedDocument out. Pure and deterministic.
 *
 * Page budget is enforced with a line estimate and a greedy rule: entries are
 * added in rank order, each with its top-K bullets, until the next one would
 * not fit. Bullets are never cut in half.
 */

import type { DateRange, Language, ProfessionalProfile } from '../profile/types.js';
import {
  experienceAchievements,
  experienceId,
  experienceRange,
  experienceTechnologies,
  type AdaptedContent,
  type ComposedCoverLetter,
  type ComposedCv,
  type ComposedExperience,
  type ComposedSkillGroup,
  type ContactLine,
  type Experience,
  type JobSignal,
  type RankedExperience,
} from './types.js';

export const CHARS_PER_LINE = 95;
export const LINES_PER_PAGE = 52;
export const CV_MAX_PAGES = 2;
export const LETTER_MAX_PAGES = 1;
export const CV_BULLETS_PER_EXPERIENCE = 4;
export const LETTER_BULLETS_PER_EXPERIENCE = 2;
export const LETTER_MAX_HIGHLIGHTS = 3;

const HEADER_LINES = 4;
const SECTION_HEADING_LINES = 2;

const STRINGS = {
  en: {
    summary: 'Professional Summary',
    experience: 'Professional Experience',
    skills: 'Skills',
    education: 'Education',
    languages: 'Languages',
    keySkills: 'Key Skills',
    present: 'Present',
    technologies: 'Technologies',
    greeting: (company: string | null) => (company ? `Dear ${company} Hiring Team,` : 'Dear Hiring Manager,'),
    signOff: 'Sincerely,',
  },
  es: {
    summary: 'Perfil Profesional',
    experience: 'Experiencia Profesional',
    skills: 'Habilidades',
    education: 'Formación',
    languages: 'Idiomas',
    keySkills: 'Competencias Clave',
    present: 'Actualidad',
    technologies: 'Tecnologías',
    greeting: (company: string | null) =>
      company ? `Estimado equipo de selección de ${company}:` : 'Estimado equipo de selección:',
    signOff: 'Atentamente,',
  },
} as const;

export function localizedStrings(language: Language) {
  return STRINGS[language];
}

export interface ComposerOptions {
  maxPages?: number;
  linesPerPage?: number;
  charsPerLine?: number;
  bulletsPerExperience?: number;
  maxHighlights?: number;
}

// ─── Line estimate ───────────────────────────────────────────────────

/** Wrapped line count: each paragraph takes at least one line. */
export function estimateLines(text: string, charsPerLine = CHARS_PER_LINE): number {
  if (!text.trim()) return 0;
  return text
    .split('\n')
    .reduce((sum, paragraph) => sum + Math.max(1, Math.ceil(paragraph.trim().length / charsPerLine)), 0);
}

function estimateAll(texts: readonly string[], charsPerLine: number): number {
  return texts.reduce((sum, t) => sum + estimateLines(t, charsPerLine), 0);
}

// ─── Shared helpers ──────────────────────────────────────────────────

export function contactLine(profile: ProfessionalProfile): ContactLine {
  const info = profile.personalInfo;
  return {
    name: info.name,
    title: info.title,
    details: [info.email, info.phone, info.location, info.website, info.linkedin, info.github].filter(
      (v): v is string => typeof v === 'string' && v.trim().length > 0,
    ),
  };
}

function formatMonth(value: string): string {
  const [year, month] = value.split('-');
  return month ? `${month}/${year}` : value;
}

export function formatPeriod(range: DateRange | null, language: Language): string | null {
  if (!range) return null;
  return `${formatMonth(range.start)} - ${range.end ? formatMonth(range.end) : STRINGS[language].present}`;
}

function slotText(adapted: AdaptedContent | undefined, slotId: string): string | undefined {
  const text = adapted?.get(slotId)?.text.trim();
  return text ? text : undefined;
}

function slotLines(adapted: AdaptedContent | undefined, slotId: string): string[] | undefined {
  const text = slotText(adapted, slotId);
  return text
    ?.split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

export function bulletsSlotId(positionId: string): string {
  return `position:${positionId}:bullets`;
}

export function roleSlotId(positionId: string): string {
  return `position:${positionId}:role`;
}

export function highlightSlotId(experience: Experience): string {
  return `${experience.kind}:${experienceId(experience)}:highlight`;
}

function composeExperience(
  experience: Experience,
  language: Language,
  bullets: string[],
  title: string,
): ComposedExperience {
  const organization = experience.kind === 'position' ? experience.position.companyName : experience.project.companyName;
  return {
    id: experienceId(experience),
    kind: experience.kind,
    title,
    organization,
    period: formatPeriod(experienceRange(experience), language),
    bullets,
    technologies: [...experienceTechnologies(experience)],
  };
}

/**
 * Adds entries in the given order while they fit in `available` lines.
 * Stops at the first entry that does not fit.
 */
function greedyFit<T>(entries: readonly T[], cost: (entry: T) => number, available: number, limit: number): T[] {
  const chosen: T[] = [];
  let used = 0;
  for (const entry of entries) {
    if (chosen.length >= limit) break;
    const lines = cost(entry);
    if (used + lines > available) break;
    chosen.push(entry);
    used += lines;
  }
  return chosen;
}

// ─── CV ──────────────────────────────────────────────────────────────

export interface ComposeCvInput {
  profile: ProfessionalProfile;
  language: Language;
  ranked: readonly RankedExperience[];
  adapted?: AdaptedContent;
}

function cvSkills(profile: ProfessionalProfile, language: Language, adapted?: AdaptedContent): ComposedSkillGroup[] {
  const groups = profile.skills.map((group) => ({ category: group.category, items: [...group.items] }));
  const keySkills = slotText(adapted, 'skills')
    ?.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  if (!keySkills || keySkills.length === 0) return groups;

  const key = new Set(keySkills.map((s) => s.toLowerCase()));
  const rest = groups
    .map((group) => ({ category: group.category, items: group.items.filter((item) => !key.has(item.toLowerCase())) }))
    .filter((group) => group.items.length > 0);
  return [{ category: STRINGS[language].keySkills, items: keySkills }, ...rest];
}

function recencyKey(experience: Experience): [number, number] {
  const range = experienceRange(experience);
  if (!range) return [Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY];
  const month = (value: string) => {
    const [y, m] = value.split('-');
    return Number.parseInt(y ?? '0', 10) * 12 + (m ? Number.parseInt(m, 10) : 12);
  };
  return [range.end ? month(range.end) : Number.POSITIVE_INFINITY, month(range.start)];
}

export function composeCv(input: ComposeCvInput, options: ComposerOptions = {}): ComposedCv {
  const { profile, language, ranked, adapted } = input;
  const charsPerLine = options.charsPerLine ?? CHARS_PER_LINE;
  const maxPages = options.maxPages ?? CV_MAX_PAGES;
  const maxLines = maxPages * (options.linesPerPage ?? LINES_PER_PAGE);
  const bulletsPer = options.bulletsPerExperience ?? CV_BULLETS_PER_EXPERIENCE;
  const strings = STRINGS[language];

  const summary = slotText(adapted, 'summary') ?? profile.summary.detailed;
  const skills = cvSkills(profile, language, adapted);
  const education = profile.education.map((e) => ({ degree: e.degree, institution: e.institution, period: e.period }));
  const languages = profile.languages.map((l) => `${l.name} (${l.level})`);

  const fixedLines =
    HEADER_LINES +
    SECTION_HEADING_LINES + estimateLines(summary, charsPerLine) +
    SECTION_HEADING_LINES +
    SECTION_HEADING_LINES + estimateAll(skills.map((g) => `${g.category}: ${g.items.join(', ')}`), charsPerLine) +
    (education.length > 0 ? SECTION_HEADING_LINES + education.length * 2 : 0) +
    (languages.length > 0 ? SECTION_HEADING_LINES + estimateLines(languages.join(', '), charsPerLine) : 0);

  const candidates = ranked
    .filter((r) => r.experience.kind === 'position')
    .map((r) => {
      const experience = r.experience;
      const id = experienceId(experience);
      const bullets = (slotLines(adapted, bulletsSlotId(id)) ?? [...experienceAchievements(experience)]).slice(0, bulletsPer);
      const baseTitle = experience.kind === 'position' ? experience.position.role : experience.project.name;
      const title = slotText(adapted, roleSlotId(id)) ?? baseTitle;
      return composeExperience(experience, language, bullets, title);
    });

  const entryCost = (entry: ComposedExperience) =>
    2 + estimateAll(entry.bullets, charsPerLine) + (entry.technologies.length > 0 ? 1 : 0) + 1;
  const chosen = greedyFit(candidates, entryCost, maxLines - fixedLines, Number.POSITIVE_INFINITY);

  const byId = new Map(ranked.map((r) => [experienceId(r.experience), r.experience]));
  const experiences = [...chosen].sort((a, b) => {
    const ea = byId.get(a.id);
    const eb = byId.get(b.id);
    if (!ea || !eb) return 0;
    const [aEnd, aStart] = recencyKey(ea);
    const [bEnd, bStart] = recencyKey(eb);
    if (aEnd !== bEnd) return bEnd > aEnd ? 1 : -1;
    if (aStart !== bStart) return bStart > aStart ? 1 : -1;
    return 0;
  });

  return {
    kind: 'cv',
    language,
    header: contactLine(profile),
    headings: {
      summary: strings.summary,
      experience: strings.experience,
      skills: strings.skills,
      education: strings.education,
      languages: strings.languages,
    },
    summary,
    experiences,
    skills,
    education,
    languages,
    budget: {
      maxPages,
      maxLines,
      estimatedLines: fixedLines + chosen.reduce((sum, e) => sum + entryCost(e), 0),
    },
  };
}

// ─── Cover letter ────────────────────────────────────────────────────

export interface ComposeCoverLetterInput {
  profile: ProfessionalProfile;
  language: Language;
  ranked: readonly RankedExperience[];
  adapted?: AdaptedContent;
  signal: JobSignal;
  /** Explicit company name, or the one the signal carries. */
  company: string | null;
}

/** Opening built only from the profile summary and the posting's own role and company. */
export function defaultOpening(profile: ProfessionalProfile, language: Language, role: string | null, company: string | null): string {
  if (language === 'es') {
    const target = role ? `el puesto de ${role}` : 'esta posición';
    return `Me dirijo a ustedes para presentar mi candidatura a ${target}${company ? ` en ${company}` : ''}. ${profile.summary.short}`;
  }
  const target = role ? `the ${role} position` : 'this position';
  return `I am writing to apply for ${target}${company ? ` at ${company}` : ''}. ${profile.summary.short}`;
}

export function defaultClosing(language: Language, company: string | null): string {
  if (language === 'es') {
    return `Me encantaría conversar sobre cómo mi experiencia puede aportar valor${company ? ` a ${company}` : ''}. Quedo a su disposición para una entrevista.`;
  }
  return `I would welcome the opportunity to discuss how my experience can contribute${company ? ` to ${company}` : ''}. Thank you for your time and consideration.`;
}

export function composeCoverLetter(input: ComposeCoverLetterInput, options: ComposerOptions = {}): ComposedCoverLetter {
  const { profile, language, ranked, adapted, signal, company } = input;
  const charsPerLine = options.charsPerLine ?? CHARS_PER_LINE;
  const maxPages = options.maxPages ?? LETTER_MAX_PAGES;
  const maxLines = maxPages * (options.linesPerPage ?? LINES_PER_PAGE);
  const bulletsPer = options.bulletsPerExperience ?? LETTER_BULLETS_PER_EXPERIENCE;
  const maxHighlights = options.maxHighlights ?? LETTER_MAX_HIGHLIGHTS;
  const strings = STRINGS[language];

  const greeting = strings.greeting(company);
  const opening = slotText(adapted, 'letter:opening') ?? defaultOpening(profile, language, signal.role, company);
  const closing = slotText(adapted, 'letter:closing') ?? defaultClosing(language, company);

  const fixedLines =
    HEADER_LINES +
    estimateLines(greeting, charsPerLine) + 1 +
    estimateLines(opening, charsPerLine) + 1 +
    estimateLines(closing, charsPerLine) + 1 +
    3;

  const candidates = ranked.map((r) => {
    const experience = r.experience;
    const bullets = (slotLines(adapted, highlightSlotId(experience)) ?? [...experienceAchievements(experience)]).slice(
      0,
      bulletsPer,
    );
    const title = experience.kind === 'position' ? experience.position.role : experience.project.name;
    return composeExperience(experience, language, bullets, title);
  });

  const entryCost = (entry: ComposedExperience) => 1 + estimateAll(entry.bullets, charsPerLine) + 1;
  const highlights = greedyFit(candidates, entryCost, maxLines - fixedLines, maxHighlights);

  return {
    kind: 'cover-letter',
    language,
    header: contactLine(profile),
    company,
    greeting,
    opening,
    highlights,
    closing,
    signOff: strings.signOff,
    budget: {
      maxPages,
      maxLines,
      estimatedLines: fixedLines + highlights.reduce((sum, e) => sum + entryCost(e), 0),
    },
  };
}
