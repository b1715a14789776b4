import type { Logger } from '../lib/logger.js';
import type { Language } from '../profile/types.js';
import type { ExtractionChain } from './extraction.js';
import { fetchJobPosting, isJobUrl } from './job-fetcher.js';
import { detectLanguage } from './language.js';
import type { JobSignal } from './types.js';

export interface JobAnalyzerDeps {
  chain: ExtractionChain;
  primaryLanguage: Language;
  fetchTimeoutMs: number;
  logger: Logger;
}

export interface JobAnalysis {
  signal: JobSignal;
  /** Job description text the signal was extracted from (fetched when a URL was given). */
  text: string;
  url: string | null;
}

/**
 * Raw job description (text or URL) to JobSignal.
 *
 * A URL is fetched first; FetchError and ExtractionError from that step
 * propagate before any completion call is made. Extraction itself never
 * fails the request: the chain ends in the heuristic strategy.
 */
export class JobAnalyzer {
  constructor(private readonly deps: JobAnalyzerDeps) {}

  async analyze(input: string): Promise<JobAnalysis> {
    const trimmed = input.trim();
    const url = isJobUrl(trimmed) ? trimmed : null;
    const text = url ? await fetchJobPosting(url, { timeoutMs: this.deps.fetchTimeoutMs }) : trimmed;

    const language = detectLanguage(text, this.deps.primaryLanguage);
    const signal = await this.deps.chain.run(text, language);

    this.deps.logger.info(
      {
        url,
        language,
        role: signal.role,
        technologies: signal.technologies.length,
        company: signal.company,
        source: signal.source,
      },
      'Job description analyzed',
    );
    return { signal, text, url };
  }
}
