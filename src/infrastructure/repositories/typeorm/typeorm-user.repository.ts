import type { User, UserDraft, UserReplacement } from '../../../domain/models/user.model';
import type { IUserRepository } from '../../../domain/repositories/user.repository.interface';
import { buildUser, replaceUser } from '../shared/entity-builders';
import { UserEntity } from './entities';
import { TypeOrmBaseRepository } from './typeorm-base.repository';
import { userFromRow, userToRow } from './typeorm-row.mapper';

export class TypeOrmUserRepository
  extends TypeOrmBaseRepository<User, UserEntity, UserDraft, UserReplacement>
  implements IUserRepository
{
  protected readonly entityName = 'User';
  protected readonly target = UserEntity;

  protected toRow(user: User): UserEntity {
    return userToRow(user);
  }

  protected fromRow(row: UserEntity): User {
    return userFromRow(row);
  }

  protected build(draft: UserDraft): User {
    return buildUser(draft);
  }

  protected replace(existing: User, replacement: UserReplacement): User {
    return replaceUser(existing, replacement);
  }

  async getByEmail(email: string): Promise<User | null> {
    return this.findOne('getByEmail', 'row.email = :email', { email });
  }

  async getByUsername(username: string): Promise<User | null> {
    return this.findOne('getByUsername', 'row.username = :username', { username });
  }

  async emailExists(email: string): Promise<boolean> {
    return this.count('emailExists', 'row.email = :email', { email });
  }

  async usernameExists(username: string): Promise<boolean> {
    return this.count('usernameExists', 'row.username = :username', { username });
  }

  async updateLastActive(id: string): Promise<boolean> {
    return this.execute('updateLastActive', id, async () => {
      const result = await this.connection.write(manager =>
        manager.update(UserEntity, id, { lastActiveAt: new Date() }),
      );
      return (result.affected ?? 0) > 0;
    });
  }
}
