import { vi } from 'vitest';
import type { CompletionProvider, CompletionRequest, CompletionResponse } from '../lib/llm-provider.js';
import { parseProfile } from '../profile/loader.js';
import type { Language, Position, ProfessionalProfile } from '../profile/types.js';
import type { JobSignal } from '../tailoring/types.js';

export const PROFILE_YAML = `
personal_info:
  name: Alex Rivera
  title: Backend Engineer
  email: alex@example.com
  phone: "+34 600 000 000"
  location: Madrid
professional_summary:
  short: Backend engineer with ten years building payment systems.
  detailed: Backend engineer with ten years building payment and logistics systems on the JVM and Python.
companies:
  - id: paycorp
    name: PayCorp
    positions:
      - id: paycorp-backend
        role: Senior Backend Engineer
        start: 2020-01
        end: present
        technologies: [Java, Spring Boot, Kafka]
        projects: [ledger]
        achievements:
          - Built the ledger service processing 2M transactions a day
          - Cut settlement latency by 40% with Kafka streams
          - Led the migration from a monolith to Spring Boot services
  - id: datacorp
    name: DataCorp
    positions:
      - role: Machine Learning Engineer
        start: 2016-03
        end: 2019-12
        technologies: [Python, TensorFlow]
        achievements:
          - Trained demand forecasting models in TensorFlow
          - Shipped a Python feature store used by four teams
projects:
  ledger:
    name: Ledger Core
    role: Tech Lead
    description: Double-entry ledger for card payments.
    technologies: [Java, PostgreSQL]
    achievements:
      - Designed the double-entry data model
education:
  - degree: BSc Computer Science
    institution: Universidad de Ejemplo
    period: 2008-2012
skills:
  - category: Languages
    items: [Java, Python, SQL]
  - category: Platforms
    items: [Kafka, PostgreSQL, Kubernetes]
languages:
  - name: Spanish
    level: Native
  - name: English
    level: C1
`;

export function testProfile(primaryLanguage: Language = 'en'): ProfessionalProfile {
  return parseProfile(PROFILE_YAML, { primaryLanguage });
}

const SPANISH_TEXT: readonly [string, string][] = [
  ['title: Backend Engineer', 'title: Ingeniero Backend'],
  ['short: Backend engineer with ten years building payment systems.', 'short: Ingeniero backend con diez años en sistemas de pago.'],
  [
    'detailed: Backend engineer with ten years building payment and logistics systems on the JVM and Python.',
    'detailed: Ingeniero backend con diez años construyendo sistemas de pago y logística en la JVM y Python.',
  ],
  ['role: Senior Backend Engineer', 'role: Ingeniero Backend Sénior'],
  ['Built the ledger service processing 2M transactions a day', 'Construí el servicio de ledger que procesa 2M de transacciones al día'],
  ['Cut settlement latency by 40% with Kafka streams', 'Reduje la latencia de liquidación un 40% con Kafka Streams'],
  ['Led the migration from a monolith to Spring Boot services', 'Dirigí la migración de un monolito a servicios Spring Boot'],
];

/** The fixture profile with its own text written in Spanish. */
export const PROFILE_YAML_ES = SPANISH_TEXT.reduce((yaml, [en, es]) => yaml.replace(en, es), PROFILE_YAML);

export function testTranslation(): ProfessionalProfile {
  return parseProfile(PROFILE_YAML_ES, { primaryLanguage: 'es' });
}

export function makeSignal(overrides: Partial<JobSignal> = {}): JobSignal {
  return {
    language: 'en',
    role: null,
    seniority: null,
    technologies: [],
    company: null,
    requirements: [],
    industryTags: [],
    minYearsExperience: null,
    source: 'heuristic',
    ...overrides,
  };
}

export function makePosition(overrides: Partial<Position> & Pick<Position, 'id'>): Position {
  return {
    companyId: 'acme',
    companyName: 'Acme',
    role: 'Software Engineer',
    range: { start: '2020-01', end: null },
    achievements: ['Shipped the first release', 'Reduced build time by half'],
    projectIds: [],
    technologies: [],
    tags: [],
    order: 0,
    ...overrides,
  };
}

export function completion(text: string): CompletionResponse {
  return { text, usage: { input_tokens: 10, output_tokens: 10 } };
}

/** Completion provider whose `complete` is a vi.fn driven by `respond`. */
export function fakeProvider(respond: (request: CompletionRequest) => string | Promise<string>) {
  const complete = vi.fn(async (request: CompletionRequest) => completion(await respond(request)));
  const provider: CompletionProvider = { name: 'fake', model: 'fake-model', complete };
  return { provider, complete };
}

/** Provider that fails every call the way an unreachable endpoint does. */
export function unreachableProvider() {
  const complete = vi.fn(async (_request: CompletionRequest): Promise<CompletionResponse> => {
    throw new TypeError('fetch failed');
  });
  const provider: CompletionProvider = { name: 'fake', model: 'fake-model', complete };
  return { provider, complete };
}
