import type { DateRange, Language, Position, Project } from '../profile/types.js';

export type { Language };

export type Seniority = 'junior' | 'mid' | 'senior' | 'lead' | 'principal';

export type ExtractionSource = 'model' | 'heuristic';

/** Normalized summary of one job posting. Per request, never persisted. */
export interface JobSignal {
  language: Language;
  role: string | null;
  seniority: Seniority | null;
  /** Case-insensitively unique, in first-seen order. */
  technologies: string[];
  company: string | null;
  requirements: string[];
  industryTags: string[];
  minYearsExperience: number | null;
  source: ExtractionSource;
}

export type Experience =
  | { kind: 'position'; position: Position }
  | { kind: 'project'; project: Project };

export interface RankedExperience {
  experience: Experience;
  score: number;
  matchedTechnologies: string[];
}

export type SlotProvenance = 'adapted' | 'cached' | 'fallback';

export interface AdaptedSlot {
  text: string;
  provenance: SlotProvenance;
}

/** Slot id → adapted text with provenance. */
export type AdaptedContent = ReadonlyMap<string, AdaptedSlot>;

export interface CompanyFacts {
  company: string;
  overview: string | null;
  industry: string | null;
  culture: string[];
  sources: string[];
}

export interface PageBudget {
  maxPages: number;
  maxLines: number;
  estimatedLines: number;
}

export interface ContactLine {
  name: string;
  title: string;
  details: string[];
}

export interface ComposedExperience {
  id: string;
  kind: Experience['kind'];
  title: string;
  organization: string | null;
  period: string | null;
  bullets: string[];
  technologies: string[];
}

export interface ComposedSkillGroup {
  category: string;
  items: string[];
}

export interface ComposedCv {
  kind: 'cv';
  language: Language;
  header: ContactLine;
  headings: Record<'summary' | 'experience' | 'skills' | 'education' | 'languages', string>;
  summary: string;
  experiences: ComposedExperience[];
  skills: ComposedSkillGroup[];
  education: { degree: string; institution: string; period: string }[];
  languages: string[];
  budget: PageBudget;
}

export interface ComposedCoverLetter {
  kind: 'cover-letter';
  language: Language;
  header: ContactLine;
  company: string | null;
  greeting: string;
  opening: string;
  highlights: ComposedExperience[];
  closing: string;
  signOff: string;
  budget: PageBudget;
}

export type ComposedDocument = ComposedCv | ComposedCoverLetter;

export type DocumentKind = ComposedDocument['kind'];

export function experienceId(experience: Experience): string {
  return experience.kind === 'position' ? experience.position.id : experience.project.id;
}

export function experienceRange(experience: Experience): DateRange | null {
  return experience.kind === 'position' ? experience.position.range : experience.project.range;
}

export function experienceTechnologies(experience: Experience): readonly string[] {
  return experience.kind === 'position' ? experience.position.technologies : experience.project.technologies;
}

export function experienceTags(experience: Experience): readonly string[] {
  return experience.kind === 'position' ? experience.position.tags : experience.project.tags;
}

export function experienceAchievements(experience: Experience): readonly string[] {
  return experience.kind === 'position' ? experience.position.achievements : experience.project.achievements;
}
