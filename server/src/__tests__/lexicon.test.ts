import { describe, it, expect } from 'vitest';
import { detectLanguage } from '../tailoring/language.js';
import { canonicalRoleTokens, dedupeTerms, mentionedTechnologies, termMatches } from '../tailoring/lexicon.js';

describe('termMatches', () => {
  it('matches whole tokens only', () => {
    expect(termMatches('java', 'Senior Java developer')).toBe(true);
    expect(termMatches('java', 'JavaScript developer')).toBe(false);
    expect(termMatches('python', 'Python/FastAPI services')).toBe(true);
  });

  it('handles terms made of symbols', () => {
    expect(termMatches('C++', 'C++ and Go')).toBe(true);
    expect(termMatches('C#', 'C++ and Go')).toBe(false);
  });

  it('never matches a blank term', () => {
    expect(termMatches('  ', 'anything')).toBe(false);
  });
});

describe('mentionedTechnologies', () => {
  it('returns lexicon terms in order of first mention', () => {
    const text = 'We use Go and Java with Spring Boot, plus JavaScript. Then we go home.';
    expect(mentionedTechnologies(text)).toEqual(['Go', 'Java', 'Spring Boot', 'JavaScript']);
  });

  it('requires exact case for two-letter terms', () => {
    expect(mentionedTechnologies('let us go build it')).toEqual([]);
  });
});

describe('dedupeTerms', () => {
  it('drops case-insensitive duplicates and blanks, keeping the first spelling', () => {
    expect(dedupeTerms(['Java', ' java ', 'Kafka', ''])).toEqual(['Java', 'Kafka']);
  });
});

describe('canonicalRoleTokens', () => {
  it('folds synonyms across languages and drops seniority words', () => {
    expect([...canonicalRoleTokens('Senior Backend Developer')].sort()).toEqual(['backend', 'engineer']);
    expect([...canonicalRoleTokens('Desarrollador Back-End Senior')].sort()).toEqual(['backend', 'engineer']);
  });
});

describe('detectLanguage', () => {
  it('detects Spanish postings', () => {
    const text = 'Buscamos un ingeniero con experiencia en desarrollo. Requisitos: Java.';
    expect(detectLanguage(text, 'en')).toBe('es');
  });

  it('detects English postings', () => {
    const text = 'We are looking for a backend engineer with 5 years of experience to join a small team.';
    expect(detectLanguage(text, 'es')).toBe('en');
  });

  it('falls back when neither language dominates', () => {
    expect(detectLanguage('Kafka, Java', 'es')).toBe('es');
    expect(detectLanguage('Kafka, Java', 'en')).toBe('en');
  });
});
