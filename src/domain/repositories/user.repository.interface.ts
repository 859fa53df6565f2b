/**
 * IUserRepository — persistence port for application users.
 *
 * Email and username are each unique. Both language references point at
 * existing languages in the relational backend; the document backend does
 * not check them.
 */
import type { IRepository } from './base.repository.interface';
import type { User, UserDraft, UserReplacement } from '../models/user.model';

export interface IUserRepository extends IRepository<User, UserDraft, UserReplacement> {
  getByEmail(email: string): Promise<User | null>;

  getByUsername(username: string): Promise<User | null>;

  emailExists(email: string): Promise<boolean>;

  usernameExists(username: string): Promise<boolean>;

  /** Set `lastActiveAt` to now without touching other fields. `false` if the user is absent. */
  updateLastActive(id: string): Promise<boolean>;
}
