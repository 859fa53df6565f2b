import type { User } from '../../domain/models/user.model';

/** A user as returned over HTTP. The password hash never leaves the service. */
export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...visible } = user;
  return visible;
}
