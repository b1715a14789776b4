import type { RetrievalWeights } from '../config.js';
import type { DateRange, ProfessionalProfile } from '../profile/types.js';
import { canonicalRoleTokens, industryTagMatches, normalizeTerm, termMatches } from './lexicon.js';
import {
  experienceRange,
  experienceTags,
  experienceTechnologies,
  type Experience,
  type JobSignal,
  type RankedExperience,
} from './types.js';

export const DEFAULT_RETRIEVAL_WEIGHTS: RetrievalWeights = { technology: 0.6, recency: 0.25, role: 0.15, industry: 0.2 };
export const RECENCY_HORIZON_YEARS = 10;
export const CV_EXPERIENCE_LIMIT = 5;
export const LETTER_EXPERIENCE_LIMIT = 3;

const TIE_EPSILON = 1e-9;

export interface RetrievalOptions {
  includeProjects?: boolean;
  weights?: RetrievalWeights;
  horizonYears?: number;
}

/** `YYYY` or `YYYY-MM` as a month count; a bare year is January for starts, December for ends. */
function toMonth(value: string, edge: 'start' | 'end'): number {
  const [yearPart, monthPart] = value.split('-');
  const year = Number.parseInt(yearPart ?? '', 10);
  const month = monthPart ? Number.parseInt(monthPart, 10) - 1 : edge === 'start' ? 0 : 11;
  return year * 12 + month;
}

/**
 * Latest month mentioned anywhere in the profile. Current roles end "now",
 * and "now" for ranking purposes is this date, so ranking never reads the clock.
 */
export function profileReferenceMonth(profile: ProfessionalProfile): number {
  let latest = Number.NEGATIVE_INFINITY;
  for (const company of profile.companies) {
    for (const position of company.positions) {
      latest = Math.max(latest, toMonth(position.range.start, 'start'));
      if (position.range.end) latest = Math.max(latest, toMonth(position.range.end, 'end'));
    }
  }
  return latest;
}

function endMonth(range: DateRange | null, reference: number): number {
  if (!range) return Number.NEGATIVE_INFINITY;
  return range.end ? toMonth(range.end, 'end') : reference;
}

function startMonth(range: DateRange | null): number {
  return range ? toMonth(range.start, 'start') : Number.NEGATIVE_INFINITY;
}

function technologyMatches(jobTech: string, entityTech: string): boolean {
  return (
    normalizeTerm(jobTech) === normalizeTerm(entityTech) ||
    termMatches(jobTech, entityTech) ||
    termMatches(entityTech, jobTech)
  );
}

export function matchTechnologies(jobTechnologies: readonly string[], entityTechnologies: readonly string[]): string[] {
  return jobTechnologies.filter((jobTech) => entityTechnologies.some((t) => technologyMatches(jobTech, t)));
}

export function matchIndustryTags(jobTags: readonly string[], entityTags: readonly string[]): string[] {
  return jobTags.filter((jobTag) => entityTags.some((tag) => industryTagMatches(jobTag, tag)));
}

function recencyScore(range: DateRange | null, reference: number, horizonYears: number): number {
  if (!range) return 0;
  const yearsAgo = Math.max(0, reference - endMonth(range, reference)) / 12;
  return Math.max(0, 1 - yearsAgo / horizonYears);
}

function roleScore(targetRole: string | null, experience: Experience): number {
  if (!targetRole) return 0;
  const target = canonicalRoleTokens(targetRole);
  if (target.size === 0) return 0;
  const text = experience.kind === 'position'
    ? experience.position.role
    : `${experience.project.role} ${experience.project.name}`;
  const own = canonicalRoleTokens(text);
  let shared = 0;
  for (const token of target) if (own.has(token)) shared++;
  return shared / target.size;
}

interface Candidate {
  ranked: RankedExperience;
  end: number;
  start: number;
  order: number;
}

/**
 * Scores every position (and project, when asked) against the signal and
 * returns them best first. Pure: the same inputs always give the same
 * ranking, and profile order only decides ties.
 */
export function rankExperiences(
  signal: JobSignal,
  profile: ProfessionalProfile,
  options: RetrievalOptions = {},
): RankedExperience[] {
  const weights = options.weights ?? DEFAULT_RETRIEVAL_WEIGHTS;
  const horizonYears = options.horizonYears ?? RECENCY_HORIZON_YEARS;
  const reference = profileReferenceMonth(profile);

  const experiences: { experience: Experience; order: number }[] = [];
  for (const company of profile.companies) {
    for (const position of company.positions) {
      experiences.push({ experience: { kind: 'position', position }, order: position.order });
    }
  }
  if (options.includeProjects) {
    const offset = experiences.length;
    for (const project of profile.projects) {
      experiences.push({ experience: { kind: 'project', project }, order: offset + project.order });
    }
  }

  const candidates: Candidate[] = experiences.map(({ experience, order }) => {
    const range = experienceRange(experience);
    const matched = matchTechnologies(signal.technologies, experienceTechnologies(experience));
    const technology = signal.technologies.length > 0 ? matched.length / signal.technologies.length : 0;
    const industry = signal.industryTags.length > 0
      ? matchIndustryTags(signal.industryTags, experienceTags(experience)).length / signal.industryTags.length
      : 0;
    const score =
      weights.technology * technology +
      weights.recency * recencyScore(range, reference, horizonYears) +
      weights.role * roleScore(signal.role, experience) +
      weights.industry * industry;
    return {
      ranked: { experience, score, matchedTechnologies: matched },
      end: endMonth(range, reference),
      start: startMonth(range),
      order,
    };
  });

  candidates.sort((a, b) => {
    const diff = b.ranked.score - a.ranked.score;
    if (Math.abs(diff) > TIE_EPSILON) return diff;
    if (a.end !== b.end) return b.end - a.end;
    if (a.start !== b.start) return b.start - a.start;
    return a.order - b.order;
  });

  return candidates.map((c) => c.ranked);
}

export function selectTopExperiences(ranked: readonly RankedExperience[], limit: number): RankedExperience[] {
  return ranked.slice(0, Math.max(0, limit));
}
