import { createHash } from 'node:crypto';
import type { JobSignal } from './types.js';

/**
 * The parts of a JobSignal that reach a prompt, in a stable form:
 * technologies lower-cased and sorted, free text trimmed.
 */
export function canonicalSignal(signal: JobSignal): string {
  return JSON.stringify({
    language: signal.language,
    role: signal.role?.trim().toLowerCase() ?? null,
    seniority: signal.seniority,
    technologies: [...new Set(signal.technologies.map((t) => t.trim().toLowerCase()))].sort(),
    company: signal.company?.trim().toLowerCase() ?? null,
    requirements: signal.requirements.map((r) => r.trim()),
    industryTags: [...new Set(signal.industryTags.map((t) => t.trim().toLowerCase()))].sort(),
    minYearsExperience: signal.minYearsExperience,
  });
}

export function fingerprint(slotId: string, sourceText: string, signal: JobSignal): string {
  return createHash('sha256')
    .update(JSON.stringify([slotId, sourceText, canonicalSignal(signal)]))
    .digest('hex');
}

export interface CacheLookup {
  value: string;
  cached: boolean;
}

export interface CacheStats {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
}

/**
 * Process-lifetime store of adapted text keyed by fingerprint. No eviction.
 *
 * Concurrent lookups of a key that is still being computed join the pending
 * computation instead of starting their own, so a fingerprint costs at most
 * one completion call at a time. Failed computations are not stored.
 */
export class AdaptationCache {
  private readonly entries = new Map<string, string>();
  private readonly pending = new Map<string, Promise<string>>();
  private hits = 0;
  private misses = 0;

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  /** Stores `value` unless the key is already present; returns what is stored. */
  insertIfAbsent(key: string, value: string): string {
    const existing = this.entries.get(key);
    if (existing !== undefined) return existing;
    this.entries.set(key, value);
    return value;
  }

  async getOrCompute(key: string, compute: () => Promise<string>): Promise<CacheLookup> {
    const stored = this.entries.get(key);
    if (stored !== undefined) {
      this.hits++;
      return { value: stored, cached: true };
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      this.hits++;
      return { value: await inFlight, cached: true };
    }

    this.misses++;
    const computation = compute()
      .then((value) => this.insertIfAbsent(key, value))
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, computation);
    return { value: await computation, cached: false };
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      inFlight: this.pending.size,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
