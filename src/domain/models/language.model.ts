/**
 * Language domain model. Identity is opaque; `code` is unique across all languages.
 */
export interface Language {
  id: string;
  name: string;
  /** ISO code, e.g. "es" */
  code: string;
  nativeName: string;
  createdAt: Date;
}

/** Input for creating a language. `id` and `createdAt` are generated when omitted. */
export interface LanguageDraft {
  id?: string;
  name: string;
  code: string;
  nativeName: string;
  createdAt?: Date;
}

/** Mutable fields replaced by an update. */
export type LanguageReplacement = Pick<Language, 'name' | 'code' | 'nativeName'>;
