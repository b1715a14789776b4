import { describe, it, expect } from 'vitest';
import { ValidationError } from '../lib/errors.js';
import { parseProfile } from '../profile/loader.js';
import { allPositions } from '../profile/types.js';
import { PROFILE_YAML, testProfile } from './fixtures.js';

const MINIMAL = `
personal_info:
  name: Sam Example
  title: Engineer
  email: sam@example.com
professional_summary:
  short: Short summary.
  detailed: Detailed summary.
companies:
  - id: acme
    name: Acme
    positions:
      - role: Engineer
        start: 2021-05
`;

function validationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('parseProfile', () => {
  it('resolves positions, projects and the primary language', () => {
    const profile = testProfile('en');

    expect(profile.primaryLanguage).toBe('en');
    expect(allPositions(profile).map((p) => p.id)).toEqual(['paycorp-backend', 'datacorp-1']);
    expect(profile.projects).toHaveLength(1);
    expect(profile.projects[0]).toMatchObject({
      id: 'ledger',
      companyName: 'PayCorp',
      range: { start: '2020-01', end: null },
    });
  });

  it('maps an end of "present" and a missing end to a current role', () => {
    const profile = parseProfile(MINIMAL, { primaryLanguage: 'es' });
    const [current] = allPositions(testProfile());

    expect(allPositions(profile)[0]?.range).toEqual({ start: '2021-05', end: null });
    expect(current?.range.end).toBeNull();
  });

  it('gives positions their own tags plus those of their projects', () => {
    const profile = parseProfile(
      PROFILE_YAML.replace('        projects: [ledger]\n', '        projects: [ledger]\n        tags: [Payments, fintech]\n').replace(
        '    technologies: [Java, PostgreSQL]\n',
        '    technologies: [Java, PostgreSQL]\n    tags: [FinTech, banking]\n',
      ),
      { primaryLanguage: 'en' },
    );

    expect(allPositions(profile).map((p) => p.tags)).toEqual([['Payments', 'fintech', 'banking'], []]);
    expect(profile.projects[0]?.tags).toEqual(['FinTech', 'banking']);
  });

  it('derives a position id from the company id and index', () => {
    const profile = parseProfile(MINIMAL, { primaryLanguage: 'es' });
    expect(allPositions(profile)[0]?.id).toBe('acme-1');
  });

  it('replaces the phone with the configured override', () => {
    const profile = parseProfile(PROFILE_YAML, { primaryLanguage: 'en', phoneOverride: '+34 000 111 222' });
    expect(profile.personalInfo.phone).toBe('+34 000 111 222');
  });

  it('returns a deeply frozen profile', () => {
    const profile = testProfile();
    const position = allPositions(profile)[0];

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.companies)).toBe(true);
    expect(position && Object.isFrozen(position)).toBe(true);
    expect(position && Object.isFrozen(position.achievements)).toBe(true);
  });

  it('rejects an empty document', () => {
    const error = validationError(() => parseProfile('', { primaryLanguage: 'en' }));
    expect(error.message).toBe('Profile document is empty');
    expect(error.code).toBe('PROFILE_INVALID');
  });

  it('rejects YAML that does not parse', () => {
    const error = validationError(() => parseProfile('companies: [unclosed', { primaryLanguage: 'en' }));
    expect(error.message).toMatch(/^Profile is not valid YAML/);
  });

  it('lists schema problems with their paths', () => {
    const broken = MINIMAL.replace('email: sam@example.com', 'email: not-an-email');
    const error = validationError(() => parseProfile(broken, { primaryLanguage: 'en' }));

    expect(error.issues.map((i) => i.path)).toEqual(['personal_info.email']);
  });

  it('rejects ids that cannot be embedded in slot ids', () => {
    const colon = MINIMAL.replace('      - role: Engineer', '      - id: "acme:lead"\n        role: Engineer');
    const spaced = `${MINIMAL}projects:
  "ledger core":
    name: Ledger Core
    role: Tech Lead
    description: Double-entry ledger.
`;

    expect(validationError(() => parseProfile(colon, { primaryLanguage: 'en' })).issues).toEqual([
      { path: 'companies.0.positions.0.id', message: 'Ids may only contain letters, digits, ".", "_" and "-"' },
    ]);
    expect(validationError(() => parseProfile(spaced, { primaryLanguage: 'en' })).message).toContain(
      'Ids may only contain letters, digits',
    );
  });

  it('rejects a position that references an unknown project', () => {
    const broken = `${MINIMAL}        projects: [missing]\n`;
    const error = validationError(() => parseProfile(broken, { primaryLanguage: 'en' }));

    expect(error.issues).toEqual([
      { path: 'companies.0.positions.0.projects.0', message: 'Unknown project "missing"' },
    ]);
  });

  it('rejects duplicate company and position ids', () => {
    const duplicated = `${MINIMAL}  - id: acme
    name: Acme Again
    positions:
      - role: Engineer
        start: 2019
`;
    const error = validationError(() => parseProfile(duplicated, { primaryLanguage: 'en' }));

    expect(error.issues.map((i) => i.message)).toEqual([
      'Duplicate company id "acme"',
      'Duplicate position id "acme-1"',
    ]);
  });
});
