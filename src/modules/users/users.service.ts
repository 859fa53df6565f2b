import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { ConflictError } from '../../domain/errors/repository.errors';
import type { User } from '../../domain/models/user.model';
import type { PageOptions } from '../../domain/repositories/pagination';
import { USER_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IUserRepository } from '../../domain/repositories/user.repository.interface';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { CreateUserDto } from './dto/create-user.dto';
import type { UpdateUserDto } from './dto/update-user.dto';
import { PASSWORD_HASHER, type PasswordHasher } from './password-hasher';
import { toPublicUser, type PublicUser } from './user.response';

function describeUserConflict(error: ConflictError): string {
  return error.constraint === 'reference'
    ? 'Native or current language does not exist'
    : 'Email or username is already taken';
}

@Injectable()
export class UsersService {
  constructor(
    @Inject(USER_REPOSITORY) private readonly users: IUserRepository,
    @Inject(PASSWORD_HASHER) private readonly passwordHasher: PasswordHasher,
    private readonly logger: AppLogger,
  ) {}

  async create(dto: CreateUserDto): Promise<PublicUser> {
    await this.assertEmailAvailable(dto.email);
    await this.assertUsernameAvailable(dto.username);

    const passwordHash = await this.passwordHasher.hash(dto.password);
    const user = await rethrowConflict(
      this.users.create({
        email: dto.email,
        username: dto.username,
        passwordHash,
        firstName: dto.firstName,
        lastName: dto.lastName,
        nativeLanguageId: dto.nativeLanguageId,
        currentLanguageId: dto.currentLanguageId,
      }),
      describeUserConflict,
    );
    this.logger.info(LogCategory.USER, 'User created', { userId: user.id });
    return toPublicUser(user);
  }

  async list(page: PageOptions): Promise<PublicUser[]> {
    const users = await this.users.getAll(page);
    return users.map(toPublicUser);
  }

  async get(id: string): Promise<PublicUser> {
    return toPublicUser(await this.require(id));
  }

  /** Fields missing from the body keep their stored values. */
  async update(id: string, dto: UpdateUserDto): Promise<PublicUser> {
    const existing = await this.require(id);
    const email = dto.email ?? existing.email;
    const username = dto.username ?? existing.username;
    if (email !== existing.email) {
      await this.assertEmailAvailable(email);
    }
    if (username !== existing.username) {
      await this.assertUsernameAvailable(username);
    }

    const passwordHash = dto.password ? await this.passwordHasher.hash(dto.password) : existing.passwordHash;
    const updated = await rethrowConflict(
      this.users.update(id, {
        email,
        username,
        passwordHash,
        firstName: dto.firstName ?? existing.firstName,
        lastName: dto.lastName ?? existing.lastName,
        nativeLanguageId: dto.nativeLanguageId ?? existing.nativeLanguageId,
        currentLanguageId: dto.currentLanguageId ?? existing.currentLanguageId,
        lastActiveAt: existing.lastActiveAt,
      }),
      describeUserConflict,
    );
    if (!updated) {
      throw new NotFoundException(`User with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.USER, 'User updated', { userId: id, credentialsChanged: dto.password !== undefined });
    return toPublicUser(updated);
  }

  async delete(id: string): Promise<void> {
    const deleted = await this.users.delete(id);
    if (!deleted) {
      throw new NotFoundException(`User with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.USER, 'User deleted', { userId: id });
  }

  async recordActivity(id: string): Promise<void> {
    const touched = await this.users.updateLastActive(id);
    if (!touched) {
      throw new NotFoundException(`User with ID "${id}" not found`);
    }
  }

  private async require(id: string): Promise<User> {
    const user = await this.users.getById(id);
    if (!user) {
      throw new NotFoundException(`User with ID "${id}" not found`);
    }
    return user;
  }

  private async assertEmailAvailable(email: string): Promise<void> {
    if (await this.users.emailExists(email)) {
      throw new ConflictException(`Email "${email}" is already registered`);
    }
  }

  private async assertUsernameAvailable(username: string): Promise<void> {
    if (await this.users.usernameExists(username)) {
      throw new ConflictException(`Username "${username}" is already taken`);
    }
  }
}
