import { describe, it, expect } from 'vitest';
import { FidelityViolation, guardBullets, restrictSkills, scrubBullets } from '../tailoring/fidelity.js';

describe('scrubBullets', () => {
  it('drops bullets naming technologies outside the allowed set', () => {
    const result = scrubBullets(
      ['Built services in Java', 'Migrated to Kubernetes on AWS', 'Cut latency by 40%'],
      ['Java'],
      'ROLE: Backend Engineer',
    );

    expect(result.kept).toEqual(['Built services in Java', 'Cut latency by 40%']);
    expect(result.dropped).toEqual([
      { bullet: 'Migrated to Kubernetes on AWS', technologies: ['Kubernetes', 'AWS'] },
    ]);
  });

  it('allows technologies the source text already mentions', () => {
    const result = scrubBullets(['Tuned PostgreSQL queries'], [], 'Worked with PostgreSQL');
    expect(result.kept).toEqual(['Tuned PostgreSQL queries']);
  });
});

describe('guardBullets', () => {
  it('returns the kept bullets when at least two survive', () => {
    expect(guardBullets(['Built services in Java', 'Cut latency by 40%'], ['Java'], '')).toEqual([
      'Built services in Java',
      'Cut latency by 40%',
    ]);
  });

  it('throws FidelityViolation when fewer than two survive', () => {
    expect(() => guardBullets(['Built services in Java', 'Ran Kubernetes clusters'], ['Java'], '')).toThrow(
      new FidelityViolation('Only 1 usable bullet(s) after scrubbing (removed mentions of Kubernetes)'),
    );
  });
});

describe('restrictSkills', () => {
  it('keeps profile skills in model order with profile spelling', () => {
    expect(restrictSkills(['kafka', 'Rust', 'JAVA', 'Kafka'], ['Java', 'Kafka', 'SQL'])).toEqual(['Kafka', 'Java']);
  });
});
