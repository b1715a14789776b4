import type { RetrievalWeights } from '../config.js';
import { LanguageUnavailableError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { allSkillItems, type Language, type ProfessionalProfile } from '../profile/types.js';
import type { CacheStats } from './adaptation-cache.js';
import type { AdaptationService, SlotRequest } from './adaptation-service.js';
import {
  bulletsSlotId,
  composeCoverLetter,
  composeCv,
  defaultClosing,
  defaultOpening,
  highlightSlotId,
  LETTER_BULLETS_PER_EXPERIENCE,
  roleSlotId,
} from './composer.js';
import type { JobAnalyzer } from './job-analyzer.js';
import { formatCompanyFacts, type ResearchHelper } from './research.js';
import {
  CV_EXPERIENCE_LIMIT,
  LETTER_EXPERIENCE_LIMIT,
  rankExperiences,
  selectTopExperiences,
} from './retriever.js';
import {
  experienceAchievements,
  type AdaptedContent,
  type CompanyFacts,
  type ComposedCoverLetter,
  type ComposedCv,
  type Experience,
  type JobSignal,
  type RankedExperience,
  type SlotProvenance,
} from './types.js';

export interface TailoringPipelineDeps {
  profile: ProfessionalProfile;
  /** The same profile written in other languages, keyed by their `primaryLanguage`. */
  translations?: readonly ProfessionalProfile[];
  analyzer: JobAnalyzer;
  adaptation: AdaptationService;
  research: ResearchHelper;
  weights: RetrievalWeights;
  logger: Logger;
}

export interface TailoringResult<D> {
  document: D;
  signal: JobSignal;
  provenance: Record<string, SlotProvenance>;
  companyFacts: CompanyFacts | null;
}

function neutralSignal(language: Language): JobSignal {
  return {
    language,
    role: null,
    seniority: null,
    technologies: [],
    company: null,
    requirements: [],
    industryTags: [],
    minYearsExperience: null,
    source: 'heuristic',
  };
}

function experienceSource(experience: Experience): string {
  if (experience.kind === 'position') {
    const { position } = experience;
    return [
      `ROLE: ${position.role}`,
      `COMPANY: ${position.companyName}`,
      `TECHNOLOGIES: ${position.technologies.join(', ')}`,
      'ACHIEVEMENTS:',
      ...position.achievements.map((a) => `- ${a}`),
    ].join('\n');
  }
  const { project } = experience;
  return [
    `PROJECT: ${project.name}`,
    `ROLE: ${project.role}`,
    ...(project.companyName ? [`COMPANY: ${project.companyName}`] : []),
    `DESCRIPTION: ${project.description}`,
    `TECHNOLOGIES: ${project.technologies.join(', ')}`,
    'ACHIEVEMENTS:',
    ...project.achievements.map((a) => `- ${a}`),
  ].join('\n');
}

/** Company facts are part of the source so they are part of the fingerprint. */
function letterSource(profile: ProfessionalProfile, facts: CompanyFacts): string {
  const candidate = `CANDIDATE: ${profile.personalInfo.name}, ${profile.personalInfo.title}`;
  return [candidate, `SUMMARY: ${profile.summary.short}`, formatCompanyFacts(facts)]
    .filter(Boolean)
    .join('\n\n');
}

function provenanceOf(adapted: AdaptedContent): Record<string, SlotProvenance> {
  return Object.fromEntries([...adapted].map(([slotId, slot]) => [slotId, slot.provenance]));
}

/**
 * Per-request orchestration: analyze, rank, adapt, compose. Holds no
 * per-request state; the adaptation cache lives in the adaptation service.
 */
export class TailoringPipeline {
  private readonly profiles = new Map<Language, ProfessionalProfile>();

  constructor(private readonly deps: TailoringPipelineDeps) {
    for (const translation of deps.translations ?? []) {
      this.profiles.set(translation.primaryLanguage, translation);
    }
    this.profiles.set(deps.profile.primaryLanguage, deps.profile);
  }

  get profile(): ProfessionalProfile {
    return this.deps.profile;
  }

  /** Profile whose own text is written in `language`, if one was loaded. */
  profileFor(language: Language): ProfessionalProfile | undefined {
    return this.profiles.get(language);
  }

  cacheStats(): CacheStats {
    return this.deps.adaptation.cacheStats();
  }

  /**
   * Profile content only, no completion calls. Headings and text share one
   * language, so a language without profile content is refused.
   */
  composeStaticCv(language: Language = this.deps.profile.primaryLanguage): ComposedCv {
    const profile = this.profileFor(language);
    if (!profile) {
      throw new LanguageUnavailableError(language, [...this.profiles.keys()]);
    }
    const ranked = rankExperiences(neutralSignal(language), profile, { weights: this.deps.weights });
    return composeCv({ profile, language, ranked });
  }

  /** Starts from the posting's language when that text exists; adaptation covers the rest. */
  private sourceProfile(language: Language): ProfessionalProfile {
    return this.profileFor(language) ?? this.deps.profile;
  }

  async composeTailoredCv(jobDescription: string): Promise<TailoringResult<ComposedCv>> {
    const { signal } = await this.deps.analyzer.analyze(jobDescription);
    const profile = this.sourceProfile(signal.language);
    const ranked = selectTopExperiences(
      rankExperiences(signal, profile, { weights: this.deps.weights }),
      CV_EXPERIENCE_LIMIT,
    );

    const adapted = await this.deps.adaptation.adaptSlots(this.cvSlots(profile, ranked, signal), signal);
    const document = composeCv({ profile, language: signal.language, ranked, adapted });
    this.logComposed('cv', signal, ranked, adapted);
    return { document, signal, provenance: provenanceOf(adapted), companyFacts: null };
  }

  /**
   * Research runs alongside analysis when the company is known up front;
   * otherwise it waits for the company name the analysis extracted.
   */
  async composeCoverLetter(jobDescription: string, company?: string): Promise<TailoringResult<ComposedCoverLetter>> {
    const explicitCompany = company?.trim() || null;
    const earlyResearch = explicitCompany ? this.deps.research.research(explicitCompany) : null;

    const { signal } = await this.deps.analyzer.analyze(jobDescription);
    const profile = this.sourceProfile(signal.language);
    const targetCompany = explicitCompany ?? signal.company;
    const facts = await (earlyResearch ?? this.deps.research.research(targetCompany, signal.role));

    const ranked = selectTopExperiences(
      rankExperiences(signal, profile, { weights: this.deps.weights, includeProjects: true }),
      LETTER_EXPERIENCE_LIMIT,
    );

    const adapted = await this.deps.adaptation.adaptSlots(
      this.letterSlots(profile, ranked, signal, targetCompany, facts),
      signal,
    );
    const document = composeCoverLetter({
      profile,
      language: signal.language,
      ranked,
      adapted,
      signal,
      company: targetCompany,
    });
    this.logComposed('cover-letter', signal, ranked, adapted);
    return { document, signal, provenance: provenanceOf(adapted), companyFacts: facts };
  }

  private cvSlots(
    profile: ProfessionalProfile,
    ranked: readonly RankedExperience[],
    signal: JobSignal,
  ): SlotRequest[] {
    const skills = allSkillItems(profile);
    const requests: SlotRequest[] = [
      { slotId: 'summary', sourceText: profile.summary.detailed, fallback: profile.summary.detailed },
      { slotId: 'skills', sourceText: skills.join(', '), fallback: '', allowedSkills: skills },
    ];

    for (const { experience } of ranked) {
      if (experience.kind !== 'position') continue;
      const { position } = experience;
      requests.push({
        slotId: bulletsSlotId(position.id),
        sourceText: experienceSource(experience),
        fallback: position.achievements.join('\n'),
        allowedTechnologies: position.technologies,
      });
      if (signal.language !== profile.primaryLanguage) {
        requests.push({ slotId: roleSlotId(position.id), sourceText: position.role, fallback: position.role });
      }
    }
    return requests;
  }

  private letterSlots(
    profile: ProfessionalProfile,
    ranked: readonly RankedExperience[],
    signal: JobSignal,
    company: string | null,
    facts: CompanyFacts,
  ): SlotRequest[] {
    const source = letterSource(profile, facts);
    return [
      {
        slotId: 'letter:opening',
        sourceText: source,
        fallback: defaultOpening(profile, signal.language, signal.role, company),
      },
      ...ranked.map(({ experience }) => ({
        slotId: highlightSlotId(experience),
        sourceText: experienceSource(experience),
        fallback: experienceAchievements(experience).slice(0, LETTER_BULLETS_PER_EXPERIENCE).join('\n'),
      })),
      { slotId: 'letter:closing', sourceText: source, fallback: defaultClosing(signal.language, company) },
    ];
  }

  private logComposed(
    kind: string,
    signal: JobSignal,
    ranked: readonly RankedExperience[],
    adapted: AdaptedContent,
  ): void {
    const fallbacks = [...adapted.values()].filter((slot) => slot.provenance === 'fallback').length;
    this.deps.logger.info(
      {
        kind,
        language: signal.language,
        experiences: ranked.length,
        slots: adapted.size,
        fallbacks,
        cache: this.deps.adaptation.cacheStats(),
      },
      'Document composed',
    );
  }
}
