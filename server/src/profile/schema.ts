/**
 * Zod schemas for the professional profile YAML (the Knowledge Base).
 *
 * Unlike the permissive schemas used for model output, these are strict about
 * required fields: the profile is the only factual source for every document,
 * so a hole in it is a startup failure rather than something to paper over.
 */

import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

/** Ids end up inside slot ids such as `position:<id>:bullets`, so no colons or spaces. */
const recordId = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9._-]+$/, { message: 'Ids may only contain letters, digits, ".", "_" and "-"' });

/** `2019`, `2019-03` or `present` (end only). */
const yearMonth = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((v) => /^\d{4}(-(0[1-9]|1[0-2]))?$/.test(v), { message: 'Expected YYYY or YYYY-MM' });

const endDate = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((v) => v.toLowerCase() === 'present' || /^\d{4}(-(0[1-9]|1[0-2]))?$/.test(v), {
    message: 'Expected YYYY, YYYY-MM or "present"',
  });

export const PersonalInfoSchema = z.object({
  name: nonEmpty,
  title: nonEmpty,
  email: z.string().email(),
  phone: z.string().optional(),
  location: z.string().optional(),
  website: z.string().optional(),
  linkedin: z.string().optional(),
  github: z.string().optional(),
});

export const ProfessionalSummarySchema = z.object({
  short: nonEmpty,
  detailed: nonEmpty,
});

export const PositionSchema = z.object({
  id: recordId.optional(),
  role: nonEmpty,
  start: yearMonth,
  end: endDate.optional(),
  location: z.string().optional(),
  achievements: z.array(nonEmpty).default([]),
  projects: z.array(nonEmpty).default([]),
  technologies: z.array(nonEmpty).default([]),
  tags: z.array(nonEmpty).default([]),
});

export const CompanySchema = z.object({
  id: recordId,
  name: nonEmpty,
  location: z.string().optional(),
  positions: z.array(PositionSchema).min(1),
});

export const ProjectSchema = z.object({
  name: nonEmpty,
  role: nonEmpty,
  description: nonEmpty,
  technologies: z.array(nonEmpty).default([]),
  achievements: z.array(nonEmpty).default([]),
  tags: z.array(nonEmpty).default([]),
});

export const EducationSchema = z.object({
  degree: nonEmpty,
  institution: nonEmpty,
  period: z.union([z.string(), z.number()]).transform((v) => String(v)),
  location: z.string().optional(),
});

export const SkillCategorySchema = z.object({
  category: nonEmpty,
  items: z.array(nonEmpty).min(1),
});

export const SpokenLanguageSchema = z.object({
  name: nonEmpty,
  level: nonEmpty,
});

export const ProfileDocumentSchema = z.object({
  personal_info: PersonalInfoSchema,
  professional_summary: ProfessionalSummarySchema,
  companies: z.array(CompanySchema).min(1),
  projects: z.record(recordId, ProjectSchema).default({}),
  education: z.array(EducationSchema).default([]),
  skills: z.array(SkillCategorySchema).default([]),
  languages: z.array(SpokenLanguageSchema).default([]),
});

export type ProfileDocument = z.infer<typeof ProfileDocumentSchema>;
