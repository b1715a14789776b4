import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { ValidationError, type ValidationIssue } from '../lib/errors.js';
import { ProfileDocumentSchema, type ProfileDocument } from './schema.js';
import type {
  Company,
  Language,
  Position,
  ProfessionalProfile,
  Project,
} from './types.js';

export interface ProfileLoadOptions {
  primaryLanguage: Language;
  /** Replaces `personal_info.phone` (kept out of the versioned YAML). */
  phoneOverride?: string;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function parseYaml(text: string): unknown {
  try {
    return yaml.load(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError('Profile is not valid YAML', [{ path: '', message }], { cause: err });
  }
}

/**
 * Cross-record checks the schema cannot express: project references resolve,
 * company and position ids are unique.
 */
function checkReferences(doc: ProfileDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const companyIds = new Set<string>();
  const positionIds = new Set<string>();

  doc.companies.forEach((company, ci) => {
    if (companyIds.has(company.id)) {
      issues.push({ path: `companies.${ci}.id`, message: `Duplicate company id "${company.id}"` });
    }
    companyIds.add(company.id);

    company.positions.forEach((position, pi) => {
      const id = position.id ?? `${company.id}-${pi + 1}`;
      if (positionIds.has(id)) {
        issues.push({ path: `companies.${ci}.positions.${pi}.id`, message: `Duplicate position id "${id}"` });
      }
      positionIds.add(id);

      position.projects.forEach((ref, ri) => {
        if (!Object.hasOwn(doc.projects, ref)) {
          issues.push({
            path: `companies.${ci}.positions.${pi}.projects.${ri}`,
            message: `Unknown project "${ref}"`,
          });
        }
      });
    });
  });

  return issues;
}

function mergeTags(...groups: readonly (readonly string[])[]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const tag of groups.flat()) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(tag);
  }
  return merged;
}

function resolveProfile(doc: ProfileDocument, options: ProfileLoadOptions): ProfessionalProfile {
  let order = 0;
  const companies: Company[] = doc.companies.map((company) => {
    const positions: Position[] = company.positions.map((position, pi) => ({
      id: position.id ?? `${company.id}-${pi + 1}`,
      companyId: company.id,
      companyName: company.name,
      role: position.role,
      range: {
        start: position.start,
        end: position.end === undefined || position.end.toLowerCase() === 'present' ? null : position.end,
      },
      location: position.location ?? company.location,
      achievements: position.achievements,
      projectIds: position.projects,
      technologies: position.technologies,
      tags: mergeTags(position.tags, ...position.projects.map((ref) => doc.projects[ref]?.tags ?? [])),
      order: order++,
    }));
    return { id: company.id, name: company.name, location: company.location, positions };
  });

  const firstReference = new Map<string, Position>();
  for (const position of companies.flatMap((c) => c.positions)) {
    for (const ref of position.projectIds) {
      if (!firstReference.has(ref)) firstReference.set(ref, position);
    }
  }

  const projects: Project[] = Object.entries(doc.projects).map(([id, project], index) => {
    const owner = firstReference.get(id);
    return {
      id,
      name: project.name,
      role: project.role,
      description: project.description,
      technologies: project.technologies,
      achievements: project.achievements,
      tags: project.tags,
      companyName: owner?.companyName ?? null,
      range: owner ? { ...owner.range } : null,
      order: index,
    };
  });

  const personalInfo = { ...doc.personal_info };
  if (options.phoneOverride) {
    personalInfo.phone = options.phoneOverride;
  }

  return {
    personalInfo,
    summary: { ...doc.professional_summary },
    companies,
    projects,
    education: doc.education,
    skills: doc.skills,
    languages: doc.languages,
    primaryLanguage: options.primaryLanguage,
  };
}

/**
 * Parse and validate a profile document. Throws ValidationError listing every
 * problem found; never returns a partially valid profile.
 */
export function parseProfile(text: string, options: ProfileLoadOptions): ProfessionalProfile {
  const raw = parseYaml(text);
  if (raw === undefined || raw === null) {
    throw new ValidationError('Profile document is empty');
  }

  const parsed = ProfileDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      'Profile failed schema validation',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }

  const referenceIssues = checkReferences(parsed.data);
  if (referenceIssues.length > 0) {
    throw new ValidationError('Profile has unresolved references', referenceIssues);
  }

  return deepFreeze(resolveProfile(parsed.data, options));
}

export async function loadProfile(path: string, options: ProfileLoadOptions): Promise<ProfessionalProfile> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Profile file could not be read (${path})`, [], { cause: new Error(message) });
  }
  return parseProfile(text, options);
}
