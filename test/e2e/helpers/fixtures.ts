/**
 * Fixture factories for E2E tests.
 *
 * Every factory returns a fresh request body with unique values (using a
 * counter) and accepts an `overrides` spread so individual tests can tweak fields.
 */

let counter = 0;

function nextId(): number {
  return ++counter;
}

/** Reset the counter between test suites if needed. */
export function resetFixtureCounter(): void {
  counter = 0;
}

// ────────────────────── Languages ──────────────────────

export interface LanguageFixture {
  name: string;
  code: string;
  nativeName: string;
}

const LANGUAGE_CODES = ['es', 'en', 'fr', 'de', 'it', 'pt', 'nl', 'sv', 'pl', 'ja'];

export function validLanguage(overrides: Partial<LanguageFixture> = {}): LanguageFixture {
  const n = nextId();
  return {
    name: `Language ${n}`,
    code: LANGUAGE_CODES[n % LANGUAGE_CODES.length] + (n >= LANGUAGE_CODES.length ? `-x${n}` : ''),
    nativeName: `Native ${n}`,
    ...overrides,
  };
}

// ────────────────────── Users ──────────────────────

export interface UserFixture {
  email: string;
  username: string;
  password?: string;
  firstName: string;
  lastName: string;
  nativeLanguageId: string;
  currentLanguageId: string;
}

export function validUser(
  languages: { nativeLanguageId: string; currentLanguageId: string },
  overrides: Partial<UserFixture> = {},
): UserFixture {
  const n = nextId();
  return {
    email: `learner${n}@example.com`,
    username: `learner${n}`,
    password: 'test-password',
    firstName: 'Test',
    lastName: `Learner${n}`,
    ...languages,
    ...overrides,
  };
}

// ────────────────────── Texts ──────────────────────

export interface TextFixture {
  title: string;
  content: string;
  languageId: string;
  userId?: string;
  proficiencyLevel: string;
  wordCount: number;
  isPublic?: boolean;
  source?: string;
}

export function validText(languageId: string, overrides: Partial<TextFixture> = {}): TextFixture {
  const n = nextId();
  return {
    title: `Reading ${n}`,
    content: 'Una historia corta para practicar.',
    languageId,
    proficiencyLevel: 'A2',
    wordCount: 5,
    ...overrides,
  };
}
