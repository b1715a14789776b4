/**
 * In-memory Knowledge Base records, resolved from the YAML profile.
 *
 * Loaded once per process and frozen; every per-request structure in
 * `tailoring/types.ts` points back into these records instead of copying them.
 */

export type Language = 'en' | 'es';

export const SUPPORTED_LANGUAGES: readonly Language[] = ['en', 'es'];

export function otherLanguage(language: Language): Language {
  return language === 'en' ? 'es' : 'en';
}

/** `start`/`end` are `YYYY` or `YYYY-MM`; a null end means the role is current. */
export interface DateRange {
  start: string;
  end: string | null;
}

export interface PersonalInfo {
  name: string;
  title: string;
  email: string;
  phone?: string;
  location?: string;
  website?: string;
  linkedin?: string;
  github?: string;
}

export interface Position {
  id: string;
  companyId: string;
  companyName: string;
  role: string;
  range: DateRange;
  location?: string;
  achievements: readonly string[];
  projectIds: readonly string[];
  technologies: readonly string[];
  /** Own industry tags plus those of the projects it references. */
  tags: readonly string[];
  /** Position index in profile order, across all companies. */
  order: number;
}

export interface Company {
  id: string;
  name: string;
  location?: string;
  positions: readonly Position[];
}

export interface Project {
  id: string;
  name: string;
  role: string;
  description: string;
  technologies: readonly string[];
  achievements: readonly string[];
  tags: readonly string[];
  /** Company of the first position that references the project, if any. */
  companyName: string | null;
  /** Date range inherited from the first referencing position. */
  range: DateRange | null;
  order: number;
}

export interface EducationEntry {
  degree: string;
  institution: string;
  period: string;
  location?: string;
}

export interface SkillCategory {
  category: string;
  items: readonly string[];
}

export interface SpokenLanguage {
  name: string;
  level: string;
}

export interface ProfessionalProfile {
  personalInfo: PersonalInfo;
  summary: { short: string; detailed: string };
  companies: readonly Company[];
  projects: readonly Project[];
  education: readonly EducationEntry[];
  skills: readonly SkillCategory[];
  languages: readonly SpokenLanguage[];
  /** Language the profile content is written in. */
  primaryLanguage: Language;
}

export function allPositions(profile: ProfessionalProfile): Position[] {
  return profile.companies.flatMap((company) => [...company.positions]);
}

export function findProject(profile: ProfessionalProfile, id: string): Project | undefined {
  return profile.projects.find((p) => p.id === id);
}

export function allSkillItems(profile: ProfessionalProfile): string[] {
  return profile.skills.flatMap((category) => [...category.items]);
}
