import { PersistenceError, RepositoryNotImplementedError } from '../../../domain/errors/repository.errors';
import type { ILanguageRepository } from '../../../domain/repositories/language.repository.interface';
import {
  LANGUAGE_REPOSITORY,
  TEXT_REPOSITORY,
  USER_REPOSITORY,
} from '../../../domain/repositories/repository.tokens';
import type { IUserRepository } from '../../../domain/repositories/user.repository.interface';
import { createSilentLogger } from '../../../../test/helpers/silent-logger';
import { BaseRepositoryFactory, type RepositoryBuilders } from './base-repository.factory';

const fakeLanguages = (): ILanguageRepository => ({
  create: jest.fn(),
  getById: jest.fn(),
  getAll: jest.fn(),
  update: jest.fn(),
  delete: jest.fn(),
  exists: jest.fn(),
  getByCode: jest.fn(),
  getByName: jest.fn(),
  codeExists: jest.fn(),
});

class TestRepositoryFactory extends BaseRepositoryFactory {
  readonly backend = 'sqlite' as const;
  readonly releaseResources = jest.fn(async () => undefined);
  readonly buildLanguages = jest.fn(fakeLanguages);

  protected readonly builders: RepositoryBuilders = {
    [LANGUAGE_REPOSITORY]: this.buildLanguages,
  };

  constructor() {
    super(createSilentLogger());
  }
}

describe('BaseRepositoryFactory', () => {
  let factory: TestRepositoryFactory;

  beforeEach(() => {
    factory = new TestRepositoryFactory();
  });

  it('should construct a repository once and cache it', () => {
    const first = factory.getRepository(LANGUAGE_REPOSITORY);
    const second = factory.getRepository(LANGUAGE_REPOSITORY);

    expect(second).toBe(first);
    expect(factory.buildLanguages).toHaveBeenCalledTimes(1);
  });

  it('should throw RepositoryNotImplementedError for a token without a builder', () => {
    expect(() => factory.getRepository(TEXT_REPOSITORY)).toThrow(RepositoryNotImplementedError);
    expect(() => factory.getRepository(TEXT_REPOSITORY)).toThrow(
      'TEXT_REPOSITORY.getRepository is not implemented by the active backend',
    );
  });

  it('should serve an override ahead of the built repository until cleared', () => {
    const built = factory.getRepository(LANGUAGE_REPOSITORY);
    const override = fakeLanguages();

    factory.registerOverride(LANGUAGE_REPOSITORY, override);
    expect(factory.getRepository(LANGUAGE_REPOSITORY)).toBe(override);

    factory.clearOverrides();
    expect(factory.getRepository(LANGUAGE_REPOSITORY)).toBe(built);
  });

  it('should serve an override for a token the backend does not build', () => {
    const users = {} as unknown as IUserRepository;
    factory.registerOverride(USER_REPOSITORY, users);

    expect(factory.getRepository(USER_REPOSITORY)).toBe(users);
  });

  it('should release resources once however often it is disposed', async () => {
    await Promise.all([factory.dispose(), factory.dispose()]);
    await factory.dispose();

    expect(factory.releaseResources).toHaveBeenCalledTimes(1);
  });

  it('should refuse to construct repositories after dispose', async () => {
    factory.getRepository(LANGUAGE_REPOSITORY);
    await factory.dispose();

    expect(() => factory.getRepository(LANGUAGE_REPOSITORY)).toThrow(PersistenceError);
    expect(() => factory.getRepository(LANGUAGE_REPOSITORY)).toThrow('Repository factory has been disposed');
  });
});
