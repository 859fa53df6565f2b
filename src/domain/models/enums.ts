/**
 * Fixed value sets shared by entities, DTO validation and storage constraints.
 */

/** CEFR levels, used both for text difficulty and for learner proficiency. */
export const PROFICIENCY_LEVELS = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'] as const;
export type ProficiencyLevel = (typeof PROFICIENCY_LEVELS)[number];

export const PARTS_OF_SPEECH = [
  'NOUN',
  'VERB',
  'ADJECTIVE',
  'ADVERB',
  'PRONOUN',
  'PREPOSITION',
  'CONJUNCTION',
  'INTERJECTION',
  'ARTICLE',
  'OTHER',
] as const;
export type PartOfSpeech = (typeof PARTS_OF_SPEECH)[number];

export const VOCABULARY_STATUSES = ['NEW', 'LEARNING', 'KNOWN', 'MASTERED'] as const;
export type VocabularyStatus = (typeof VOCABULARY_STATUSES)[number];
