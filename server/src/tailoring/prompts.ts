/**
 * Prompt text for every completion the pipeline issues.
 *
 * Each builder gets the slot's source text verbatim. Anything a model may
 * state must already be in that text; the prompts say so explicitly and the
 * fidelity guard checks the bullets afterwards.
 */

import type { Language } from '../profile/types.js';
import type { JobSignal } from './types.js';

export interface Prompt {
  system: string;
  prompt: string;
}

const LANGUAGE_NAME: Record<Language, string> = { en: 'English', es: 'Spanish' };

const NO_INVENTION =
  'Use ONLY facts present in the SOURCE. Never add employers, technologies, numbers or achievements that are not in the SOURCE.';

function describeSignal(signal: JobSignal): string {
  const lines = [
    `TARGET ROLE: ${signal.role ?? 'Not specified'}`,
    `SENIORITY: ${signal.seniority ?? 'Not specified'}`,
    `KEY TECHNOLOGIES: ${signal.technologies.join(', ') || 'None specified'}`,
  ];
  if (signal.industryTags.length > 0) lines.push(`INDUSTRY: ${signal.industryTags.join(', ')}`);
  if (signal.minYearsExperience !== null) lines.push(`MINIMUM EXPERIENCE: ${signal.minYearsExperience} years`);
  if (signal.company) lines.push(`COMPANY: ${signal.company}`);
  if (signal.requirements.length > 0) {
    lines.push(`REQUIREMENTS:\n${signal.requirements.slice(0, 6).map((r) => `- ${r}`).join('\n')}`);
  }
  return lines.join('\n');
}

// ─── Extraction ──────────────────────────────────────────────────────

const EXTRACTION_SHAPE = `{
  "role": "Job title as written in the posting, or null",
  "seniority": "junior | mid | senior | lead | principal | null",
  "technologies": ["Technologies, languages, frameworks and tools named in the posting"],
  "company": "Hiring company name, or null",
  "requirements": ["Up to 8 short requirement lines"]
}`;

export function extractionPrompt(text: string, strict: boolean): Prompt {
  if (!strict) {
    return {
      system: `Parse job descriptions into structured fields. Return ONLY valid JSON with this exact shape:\n${EXTRACTION_SHAPE}`,
      prompt: `JOB DESCRIPTION:\n${text}`,
    };
  }
  return {
    system:
      'You are a JSON generator. Your entire reply must be ONE JSON object and nothing else: no markdown fences, no comments, no prose before or after. ' +
      `Use double quotes for every key and string. Use null for unknown values. Shape:\n${EXTRACTION_SHAPE}`,
    prompt: `JOB DESCRIPTION:\n${text}\n\nReply with the JSON object only.`,
  };
}

// ─── CV slots ────────────────────────────────────────────────────────

export function summaryPrompt(source: string, signal: JobSignal): Prompt {
  const language = LANGUAGE_NAME[signal.language];
  return {
    system: `You rewrite professional CV summaries to fit a job posting. ${NO_INVENTION} Write in ${language}. Output ONLY the summary: 3-4 lines, first person implied, no heading, no list of technologies.`,
    prompt: `${describeSignal(signal)}\n\nSOURCE:\n${source}`,
  };
}

export function skillsPrompt(source: string, signal: JobSignal): Prompt {
  return {
    system: `You select the key skills for a CV. Choose ONLY from the skills listed in the SOURCE, most relevant to the job first, at most 12. Output ONLY a comma-separated list, no heading.`,
    prompt: `${describeSignal(signal)}\n\nSOURCE:\n${source}`,
  };
}

export function bulletsPrompt(source: string, signal: JobSignal): Prompt {
  const language = LANGUAGE_NAME[signal.language];
  return {
    system: `You rewrite CV achievement bullets to emphasize what matters for a job posting. ${NO_INVENTION} Keep every number exactly as written. Write in ${language}. Output ONLY the bullets, one per line, starting with "- ", at most 4 bullets, most relevant first.`,
    prompt: `${describeSignal(signal)}\n\nSOURCE:\n${source}`,
  };
}

export function rolePrompt(source: string, signal: JobSignal): Prompt {
  const language = LANGUAGE_NAME[signal.language];
  return {
    system: `Translator. Translate the job title into ${language}. Output ONLY the translated title on one line, nothing else.`,
    prompt: source,
  };
}

// ─── Cover-letter slots ──────────────────────────────────────────────

export function openingPrompt(source: string, signal: JobSignal): Prompt {
  const language = LANGUAGE_NAME[signal.language];
  return {
    system: `You write the opening paragraph of a cover letter. ${NO_INVENTION} Company context, when present, may be referenced but not embellished. Write in ${language}, 3-4 sentences, no greeting, no sign-off.`,
    prompt: `${describeSignal(signal)}\n\nSOURCE:\n${source}`,
  };
}

export function highlightPrompt(source: string, signal: JobSignal): Prompt {
  const language = LANGUAGE_NAME[signal.language];
  return {
    system: `You turn one experience from a CV into a short cover-letter paragraph showing fit for the job. ${NO_INVENTION} Write in ${language}, 2-3 sentences, first person, no heading.`,
    prompt: `${describeSignal(signal)}\n\nSOURCE:\n${source}`,
  };
}

export function closingPrompt(source: string, signal: JobSignal): Prompt {
  const language = LANGUAGE_NAME[signal.language];
  return {
    system: `You write the closing paragraph of a cover letter: motivation and a call to an interview. ${NO_INVENTION} Write in ${language}, 2-3 sentences, no sign-off or name.`,
    prompt: `${describeSignal(signal)}\n\nSOURCE:\n${source}`,
  };
}
