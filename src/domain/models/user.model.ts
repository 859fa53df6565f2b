/**
 * User domain model.
 *
 * `passwordHash` is an opaque string produced by the password hasher. It never
 * leaves the service layer and is redacted from logs.
 */
export interface User {
  id: string;
  email: string;
  username: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  nativeLanguageId: string;
  currentLanguageId: string;
  createdAt: Date;
  updatedAt: Date;
  lastActiveAt: Date | null;
}

export interface UserDraft {
  id?: string;
  email: string;
  username: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  nativeLanguageId: string;
  currentLanguageId: string;
  lastActiveAt?: Date | null;
  createdAt?: Date;
  updatedAt?: Date;
}

export type UserReplacement = Pick<
  User,
  | 'email'
  | 'username'
  | 'passwordHash'
  | 'firstName'
  | 'lastName'
  | 'nativeLanguageId'
  | 'currentLanguageId'
  | 'lastActiveAt'
>;
