/**
 * Behaviour every backend must share. Each backend spec calls
 * `describeRepositoryContract` with a factory over fresh, empty storage.
 */
import { ConflictError, PersistenceError } from '../../src/domain/errors/repository.errors';
import type { Language } from '../../src/domain/models/language.model';
import type { UserDraft } from '../../src/domain/models/user.model';
import type { TextDraft } from '../../src/domain/models/text.model';
import type { IRepositoryFactory } from '../../src/domain/repositories/repository-factory.interface';
import {
  LANGUAGE_REPOSITORY,
  TEXT_REPOSITORY,
  TEXT_TAG_REPOSITORY,
  USER_LANGUAGE_REPOSITORY,
  USER_REPOSITORY,
  USER_VOCABULARY_ITEM_REPOSITORY,
  USER_VOCABULARY_REPOSITORY,
  type RepositoryMap,
  type RepositoryToken,
} from '../../src/domain/repositories/repository.tokens';

/** Fixed instants so list order never depends on wall-clock time. */
export const at = (minute: number): Date => new Date(Date.UTC(2024, 0, 1, 9, minute));

export function describeRepositoryContract(backend: string, createFactory: () => IRepositoryFactory): void {
  describe(`${backend} repository contract`, () => {
    let factory: IRepositoryFactory;
    const repo = <K extends RepositoryToken>(token: K): RepositoryMap[K] => factory.getRepository(token);

    let spanish: Language;
    let english: Language;

    const userDraft = (overrides: Partial<UserDraft> = {}): UserDraft => ({
      email: 'ana@example.com',
      username: 'ana',
      passwordHash: 'test-hash',
      firstName: 'Ana',
      lastName: 'Lopez',
      nativeLanguageId: spanish.id,
      currentLanguageId: english.id,
      ...overrides,
    });

    const textDraft = (overrides: Partial<TextDraft> = {}): TextDraft => ({
      title: 'A short story',
      content: 'Había una vez...',
      languageId: spanish.id,
      proficiencyLevel: 'A2',
      wordCount: 3,
      ...overrides,
    });

    beforeEach(async () => {
      factory = createFactory();
      spanish = await repo(LANGUAGE_REPOSITORY).create({
        name: 'Spanish',
        code: 'es',
        nativeName: 'Español',
        createdAt: at(0),
      });
      english = await repo(LANGUAGE_REPOSITORY).create({
        name: 'English',
        code: 'en',
        nativeName: 'English',
        createdAt: at(1),
      });
    });

    afterEach(async () => {
      await factory.dispose();
    });

    // ─── Languages ─────────────────────────────────────────────────────

    describe('languages', () => {
      it('should return the persisted language from create and getById', async () => {
        const created = await repo(LANGUAGE_REPOSITORY).create({ name: 'French', code: 'fr', nativeName: 'Français' });

        expect(created.id).toEqual(expect.any(String));
        expect(created.createdAt).toBeInstanceOf(Date);
        await expect(repo(LANGUAGE_REPOSITORY).getById(created.id)).resolves.toEqual(created);
      });

      it('should reject a duplicate code with a unique ConflictError', async () => {
        const duplicate = repo(LANGUAGE_REPOSITORY).create({
          name: 'Spanish Variant',
          code: 'es',
          nativeName: 'Español',
        });

        await expect(duplicate).rejects.toBeInstanceOf(ConflictError);
        await expect(duplicate).rejects.toMatchObject({ constraint: 'unique', entity: 'Language' });
        await expect(repo(LANGUAGE_REPOSITORY).codeExists('es')).resolves.toBe(true);
      });

      it('should report a ConflictError as a PersistenceError too', async () => {
        await expect(
          repo(LANGUAGE_REPOSITORY).create({ name: 'Other', code: 'en', nativeName: 'Other' }),
        ).rejects.toBeInstanceOf(PersistenceError);
      });

      it('should find by code and by exact name', async () => {
        await expect(repo(LANGUAGE_REPOSITORY).getByCode('en')).resolves.toEqual(english);
        await expect(repo(LANGUAGE_REPOSITORY).getByName('Spanish')).resolves.toEqual(spanish);
        await expect(repo(LANGUAGE_REPOSITORY).getByName('spanish')).resolves.toBeNull();
        await expect(repo(LANGUAGE_REPOSITORY).codeExists('de')).resolves.toBe(false);
      });

      it('should replace mutable fields and keep createdAt on update', async () => {
        const updated = await repo(LANGUAGE_REPOSITORY).update(spanish.id, {
          name: 'Castilian',
          code: 'es',
          nativeName: 'Castellano',
        });

        expect(updated).toEqual({ ...spanish, name: 'Castilian', nativeName: 'Castellano' });
        await expect(repo(LANGUAGE_REPOSITORY).getById(spanish.id)).resolves.toEqual(updated);
      });

      it('should return null when updating an unknown id', async () => {
        await expect(
          repo(LANGUAGE_REPOSITORY).update('missing-id', { name: 'X', code: 'xx', nativeName: 'X' }),
        ).resolves.toBeNull();
      });

      it('should reject an update onto a taken code', async () => {
        await expect(
          repo(LANGUAGE_REPOSITORY).update(english.id, { name: 'English', code: 'es', nativeName: 'English' }),
        ).rejects.toMatchObject({ constraint: 'unique' });
      });

      it('should delete idempotently', async () => {
        const french = await repo(LANGUAGE_REPOSITORY).create({ name: 'French', code: 'fr', nativeName: 'Français' });

        await expect(repo(LANGUAGE_REPOSITORY).delete(french.id)).resolves.toBe(true);
        await expect(repo(LANGUAGE_REPOSITORY).delete(french.id)).resolves.toBe(false);
        await expect(repo(LANGUAGE_REPOSITORY).exists(french.id)).resolves.toBe(false);
        await expect(repo(LANGUAGE_REPOSITORY).getById(french.id)).resolves.toBeNull();
      });

      it('should remove study entries for a deleted language', async () => {
        const french = await repo(LANGUAGE_REPOSITORY).create({ name: 'French', code: 'fr', nativeName: 'Français' });
        const user = await repo(USER_REPOSITORY).create(userDraft());
        await repo(USER_LANGUAGE_REPOSITORY).create({ userId: user.id, languageId: french.id, proficiencyLevel: 'A1' });

        await expect(repo(LANGUAGE_REPOSITORY).delete(french.id)).resolves.toBe(true);
        await expect(repo(USER_LANGUAGE_REPOSITORY).get(user.id, french.id)).resolves.toBeNull();
      });
    });

    // ─── Pagination ────────────────────────────────────────────────────

    describe('pagination', () => {
      beforeEach(async () => {
        await repo(LANGUAGE_REPOSITORY).create({ name: 'German', code: 'de', nativeName: 'Deutsch', createdAt: at(3) });
        await repo(LANGUAGE_REPOSITORY).create({ name: 'French', code: 'fr', nativeName: 'Français', createdAt: at(2) });
      });

      it('should order by createdAt ascending', async () => {
        const all = await repo(LANGUAGE_REPOSITORY).getAll();
        expect(all.map(language => language.code)).toEqual(['es', 'en', 'fr', 'de']);
      });

      it('should break createdAt ties by id', async () => {
        const texts = repo(TEXT_REPOSITORY);
        await texts.create(textDraft({ id: 'text-b', createdAt: at(5) }));
        await texts.create(textDraft({ id: 'text-a', createdAt: at(5) }));
        await texts.create(textDraft({ id: 'text-c', createdAt: at(4) }));

        const all = await texts.getAll();
        expect(all.map(text => text.id)).toEqual(['text-c', 'text-a', 'text-b']);
      });

      it('should return an empty list for limit 0', async () => {
        await expect(repo(LANGUAGE_REPOSITORY).getAll({ limit: 0 })).resolves.toEqual([]);
      });

      it('should return an empty list when skip reaches the total', async () => {
        await expect(repo(LANGUAGE_REPOSITORY).getAll({ skip: 4 })).resolves.toEqual([]);
        await expect(repo(LANGUAGE_REPOSITORY).getAll({ skip: 40, limit: 5 })).resolves.toEqual([]);
      });

      it('should clamp negative values to 0', async () => {
        await expect(repo(LANGUAGE_REPOSITORY).getAll({ skip: -3, limit: 2 })).resolves.toHaveLength(2);
        await expect(repo(LANGUAGE_REPOSITORY).getAll({ limit: -1 })).resolves.toEqual([]);
      });

      it('should default to 100 rows', async () => {
        const tags = repo(TEXT_TAG_REPOSITORY);
        for (let i = 0; i < 101; i++) {
          await tags.create({ name: `tag-${String(i).padStart(3, '0')}` });
        }

        const page = await tags.getAll();
        expect(page).toHaveLength(100);
        expect(page[0]?.name).toBe('tag-000');
        expect(page[99]?.name).toBe('tag-099');
      });

      it('should page through texts of one language without overlap', async () => {
        const texts = repo(TEXT_REPOSITORY);
        for (let i = 0; i < 5; i++) {
          await texts.create(textDraft({ title: `Text ${i}`, createdAt: at(10 + i) }));
        }
        await texts.create(textDraft({ title: 'English text', languageId: english.id, createdAt: at(12) }));

        const first = await texts.getByLanguage(spanish.id, { skip: 0, limit: 2 });
        const second = await texts.getByLanguage(spanish.id, { skip: 2, limit: 2 });
        const third = await texts.getByLanguage(spanish.id, { skip: 4, limit: 2 });

        expect(first).toHaveLength(2);
        expect(second).toHaveLength(2);
        expect(third).toHaveLength(1);
        const titles = [...first, ...second, ...third].map(text => text.title);
        expect(titles).toEqual(['Text 0', 'Text 1', 'Text 2', 'Text 3', 'Text 4']);
        expect(new Set([...first, ...second, ...third].map(text => text.id)).size).toBe(5);
      });
    });

    // ─── Users ─────────────────────────────────────────────────────────

    describe('users', () => {
      it('should look users up by email and username', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft({ createdAt: at(5) }));

        expect(user).toMatchObject({ updatedAt: at(5), lastActiveAt: null });
        await expect(repo(USER_REPOSITORY).getByEmail('ana@example.com')).resolves.toEqual(user);
        await expect(repo(USER_REPOSITORY).getByUsername('ana')).resolves.toEqual(user);
        await expect(repo(USER_REPOSITORY).emailExists('ana@example.com')).resolves.toBe(true);
        await expect(repo(USER_REPOSITORY).usernameExists('bob')).resolves.toBe(false);
      });

      it('should reject a duplicate email', async () => {
        await repo(USER_REPOSITORY).create(userDraft());
        await expect(repo(USER_REPOSITORY).create(userDraft({ username: 'other' }))).rejects.toMatchObject({
          constraint: 'unique',
        });
      });

      it('should reject a duplicate username', async () => {
        await repo(USER_REPOSITORY).create(userDraft());
        await expect(
          repo(USER_REPOSITORY).create(userDraft({ email: 'other@example.com' })),
        ).rejects.toBeInstanceOf(ConflictError);
      });

      it('should touch only lastActiveAt', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft({ createdAt: at(5) }));

        await expect(repo(USER_REPOSITORY).updateLastActive(user.id)).resolves.toBe(true);

        const reloaded = await repo(USER_REPOSITORY).getById(user.id);
        expect(reloaded?.lastActiveAt).toBeInstanceOf(Date);
        expect(reloaded).toEqual({ ...user, lastActiveAt: reloaded?.lastActiveAt });
      });

      it('should report false when touching an unknown user', async () => {
        await expect(repo(USER_REPOSITORY).updateLastActive('missing-id')).resolves.toBe(false);
      });

      it('should refresh updatedAt on update', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft({ createdAt: at(5) }));
        const updated = await repo(USER_REPOSITORY).update(user.id, {
          email: user.email,
          username: 'ana.lopez',
          passwordHash: user.passwordHash,
          firstName: user.firstName,
          lastName: user.lastName,
          nativeLanguageId: user.nativeLanguageId,
          currentLanguageId: spanish.id,
          lastActiveAt: null,
        });

        expect(updated?.username).toBe('ana.lopez');
        expect(updated?.createdAt).toEqual(at(5));
        expect(updated?.updatedAt.getTime()).toBeGreaterThan(at(5).getTime());
        await expect(repo(USER_REPOSITORY).getByUsername('ana')).resolves.toBeNull();
      });

      it('should cascade a user delete to study entries and vocabularies, and orphan texts', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        await repo(USER_LANGUAGE_REPOSITORY).create({ userId: user.id, languageId: english.id, proficiencyLevel: 'B1' });
        const vocabulary = await repo(USER_VOCABULARY_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          name: 'Daily words',
        });
        const item = await repo(USER_VOCABULARY_ITEM_REPOSITORY).create({
          userVocabularyId: vocabulary.id,
          term: 'apple',
        });
        const text = await repo(TEXT_REPOSITORY).create(textDraft({ userId: user.id }));

        await expect(repo(USER_REPOSITORY).delete(user.id)).resolves.toBe(true);

        await expect(repo(USER_LANGUAGE_REPOSITORY).getByUser(user.id)).resolves.toEqual([]);
        await expect(repo(USER_VOCABULARY_REPOSITORY).getById(vocabulary.id)).resolves.toBeNull();
        await expect(repo(USER_VOCABULARY_ITEM_REPOSITORY).getById(item.id)).resolves.toBeNull();
        const orphaned = await repo(TEXT_REPOSITORY).getById(text.id);
        expect(orphaned?.userId).toBeNull();
      });
    });

    // ─── Texts ─────────────────────────────────────────────────────────

    describe('texts', () => {
      it('should apply creation defaults', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft({ createdAt: at(5) }));

        expect(text).toMatchObject({ isPublic: true, userId: null, source: null, updatedAt: at(5) });
        await expect(repo(TEXT_REPOSITORY).getById(text.id)).resolves.toEqual(text);
      });

      it('should filter by user, level and public flag', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        const mine = await repo(TEXT_REPOSITORY).create(
          textDraft({ userId: user.id, proficiencyLevel: 'B2', createdAt: at(5) }),
        );
        const hidden = await repo(TEXT_REPOSITORY).create(textDraft({ isPublic: false, createdAt: at(6) }));

        await expect(repo(TEXT_REPOSITORY).getByUser(user.id)).resolves.toEqual([mine]);
        await expect(repo(TEXT_REPOSITORY).getByProficiencyLevel('B2')).resolves.toEqual([mine]);
        await expect(repo(TEXT_REPOSITORY).getPublicTexts()).resolves.toEqual([mine]);
        await expect(repo(TEXT_REPOSITORY).getByLanguage(spanish.id)).resolves.toEqual([mine, hidden]);
      });

      it('should find private texts by title while leaving them out of public listings', async () => {
        const hidden = await repo(TEXT_REPOSITORY).create(textDraft({ title: 'Secret Garden', isPublic: false }));

        await expect(repo(TEXT_REPOSITORY).getPublicTexts()).resolves.toEqual([]);
        await expect(repo(TEXT_REPOSITORY).searchByTitle('garden')).resolves.toEqual([hidden]);
      });

      it('should match titles case-insensitively and literally', async () => {
        const texts = repo(TEXT_REPOSITORY);
        const percent = await texts.create(textDraft({ title: 'Score 100% sure', createdAt: at(5) }));
        await texts.create(textDraft({ title: 'Score 1000 sure', createdAt: at(6) }));
        const underscore = await texts.create(textDraft({ title: 'Notes a_b', createdAt: at(7) }));
        await texts.create(textDraft({ title: 'Notes axb', createdAt: at(8) }));
        const dotted = await texts.create(textDraft({ title: 'Chapter 1.5', createdAt: at(9) }));
        await texts.create(textDraft({ title: 'Chapter 105', createdAt: at(10) }));

        await expect(texts.searchByTitle('100%')).resolves.toEqual([percent]);
        await expect(texts.searchByTitle('A_B')).resolves.toEqual([underscore]);
        await expect(texts.searchByTitle('1.5')).resolves.toEqual([dotted]);
        await expect(texts.searchByTitle('SCORE')).resolves.toHaveLength(2);
      });

      it('should fold non-ASCII capitals when matching titles', async () => {
        const texts = repo(TEXT_REPOSITORY);
        const summer = await texts.create(textDraft({ title: 'Été à Paris', createdAt: at(5) }));
        await texts.create(textDraft({ title: 'Winter in Oslo', createdAt: at(6) }));

        await expect(texts.searchByTitle('été')).resolves.toEqual([summer]);
        await expect(texts.searchByTitle('ÉTÉ')).resolves.toEqual([summer]);
        await expect(texts.searchByTitle('À PARIS')).resolves.toEqual([summer]);
      });

      it('should replace every mutable field on update', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft({ createdAt: at(5) }));
        const updated = await repo(TEXT_REPOSITORY).update(text.id, {
          title: 'Revised',
          content: 'New content',
          languageId: english.id,
          userId: null,
          proficiencyLevel: 'C1',
          wordCount: 2,
          isPublic: false,
          source: 'textbook',
        });

        expect(updated).toMatchObject({
          id: text.id,
          title: 'Revised',
          languageId: english.id,
          proficiencyLevel: 'C1',
          isPublic: false,
          source: 'textbook',
          createdAt: at(5),
        });
        await expect(repo(TEXT_REPOSITORY).getById(text.id)).resolves.toEqual(updated);
      });
    });

    // ─── Tags ──────────────────────────────────────────────────────────

    describe('tags', () => {
      it('should keep tag names unique', async () => {
        await repo(TEXT_TAG_REPOSITORY).create({ name: 'news' });

        await expect(repo(TEXT_TAG_REPOSITORY).create({ name: 'news' })).rejects.toBeInstanceOf(ConflictError);
        await expect(repo(TEXT_TAG_REPOSITORY).nameExists('news')).resolves.toBe(true);
        await expect(repo(TEXT_TAG_REPOSITORY).getByName('news')).resolves.toMatchObject({ description: null });
      });

      it('should list tags by name', async () => {
        await repo(TEXT_TAG_REPOSITORY).create({ name: 'travel' });
        await repo(TEXT_TAG_REPOSITORY).create({ name: 'food', description: 'Recipes' });

        const tags = await repo(TEXT_TAG_REPOSITORY).getAll();
        expect(tags.map(tag => tag.name)).toEqual(['food', 'travel']);
      });

      it('should attach a tag once', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft());
        const tag = await repo(TEXT_TAG_REPOSITORY).create({ name: 'news' });

        await expect(repo(TEXT_REPOSITORY).addTag(text.id, tag.id)).resolves.toBe(true);
        await expect(repo(TEXT_REPOSITORY).addTag(text.id, tag.id)).resolves.toBe(false);
        await expect(repo(TEXT_REPOSITORY).getTagIds(text.id)).resolves.toEqual([tag.id]);
      });

      it('should not attach a tag to an unknown text', async () => {
        const tag = await repo(TEXT_TAG_REPOSITORY).create({ name: 'news' });
        await expect(repo(TEXT_REPOSITORY).addTag('missing-id', tag.id)).resolves.toBe(false);
      });

      it('should reject attaching an unknown tag', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft());

        const attempt = repo(TEXT_REPOSITORY).addTag(text.id, 'missing-tag');
        await expect(attempt).rejects.toBeInstanceOf(ConflictError);
        await expect(attempt).rejects.toMatchObject({ constraint: 'reference' });
      });

      it('should detach a tag and report whether it was attached', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft());
        const tag = await repo(TEXT_TAG_REPOSITORY).create({ name: 'news' });
        await repo(TEXT_REPOSITORY).addTag(text.id, tag.id);

        await expect(repo(TEXT_REPOSITORY).removeTag(text.id, tag.id)).resolves.toBe(true);
        await expect(repo(TEXT_REPOSITORY).removeTag(text.id, tag.id)).resolves.toBe(false);
        await expect(repo(TEXT_REPOSITORY).getTagIds(text.id)).resolves.toEqual([]);
      });

      it('should return sorted tag ids and none for an unknown text', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft());
        await repo(TEXT_TAG_REPOSITORY).create({ id: 'tag-z', name: 'zeta' });
        await repo(TEXT_TAG_REPOSITORY).create({ id: 'tag-a', name: 'alpha' });
        await repo(TEXT_REPOSITORY).addTag(text.id, 'tag-z');
        await repo(TEXT_REPOSITORY).addTag(text.id, 'tag-a');

        await expect(repo(TEXT_REPOSITORY).getTagIds(text.id)).resolves.toEqual(['tag-a', 'tag-z']);
        await expect(repo(TEXT_REPOSITORY).getTagIds('missing-id')).resolves.toEqual([]);
      });

      it('should return each text carrying any of the tags once', async () => {
        const texts = repo(TEXT_REPOSITORY);
        const both = await texts.create(textDraft({ title: 'Both', createdAt: at(5) }));
        const second = await texts.create(textDraft({ title: 'Second', createdAt: at(6) }));
        await texts.create(textDraft({ title: 'Untagged', createdAt: at(7) }));
        const first = await repo(TEXT_TAG_REPOSITORY).create({ name: 'first' });
        const other = await repo(TEXT_TAG_REPOSITORY).create({ name: 'other' });
        await texts.addTag(both.id, first.id);
        await texts.addTag(both.id, other.id);
        await texts.addTag(second.id, other.id);

        await expect(texts.getByTags([first.id, other.id, other.id])).resolves.toEqual([both, second]);
        await expect(texts.getByTags([first.id])).resolves.toEqual([both]);
        await expect(texts.getByTags([other.id], { skip: 1 })).resolves.toEqual([second]);
        await expect(texts.getByTags([])).resolves.toEqual([]);
      });

      it('should detach a deleted tag from its texts', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft());
        const kept = await repo(TEXT_TAG_REPOSITORY).create({ name: 'kept' });
        const dropped = await repo(TEXT_TAG_REPOSITORY).create({ name: 'dropped' });
        await repo(TEXT_REPOSITORY).addTag(text.id, kept.id);
        await repo(TEXT_REPOSITORY).addTag(text.id, dropped.id);

        await expect(repo(TEXT_TAG_REPOSITORY).delete(dropped.id)).resolves.toBe(true);

        await expect(repo(TEXT_REPOSITORY).getTagIds(text.id)).resolves.toEqual([kept.id]);
        await expect(repo(TEXT_REPOSITORY).getByTags([dropped.id])).resolves.toEqual([]);
      });

      it('should drop associations with a deleted text', async () => {
        const text = await repo(TEXT_REPOSITORY).create(textDraft());
        const tag = await repo(TEXT_TAG_REPOSITORY).create({ name: 'news' });
        await repo(TEXT_REPOSITORY).addTag(text.id, tag.id);

        await expect(repo(TEXT_REPOSITORY).delete(text.id)).resolves.toBe(true);
        await expect(repo(TEXT_REPOSITORY).getByTags([tag.id])).resolves.toEqual([]);
      });
    });

    // ─── User languages ────────────────────────────────────────────────

    describe('user languages', () => {
      it('should key entries by user and language', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        const entry = await repo(USER_LANGUAGE_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          proficiencyLevel: 'B1',
          createdAt: at(5),
        });

        expect(entry).toEqual({
          userId: user.id,
          languageId: english.id,
          proficiencyLevel: 'B1',
          startedAt: at(5),
          createdAt: at(5),
          updatedAt: at(5),
        });
        await expect(repo(USER_LANGUAGE_REPOSITORY).get(user.id, english.id)).resolves.toEqual(entry);
        await expect(repo(USER_LANGUAGE_REPOSITORY).get(user.id, spanish.id)).resolves.toBeNull();
      });

      it('should reject a second entry for the same pair', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        await repo(USER_LANGUAGE_REPOSITORY).create({ userId: user.id, languageId: english.id, proficiencyLevel: 'B1' });

        await expect(
          repo(USER_LANGUAGE_REPOSITORY).create({ userId: user.id, languageId: english.id, proficiencyLevel: 'C1' }),
        ).rejects.toMatchObject({ constraint: 'unique' });
      });

      it('should list a user entries by start date', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        const later = await repo(USER_LANGUAGE_REPOSITORY).create({
          userId: user.id,
          languageId: spanish.id,
          proficiencyLevel: 'C2',
          startedAt: at(20),
        });
        const earlier = await repo(USER_LANGUAGE_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          proficiencyLevel: 'A1',
          startedAt: at(10),
        });

        await expect(repo(USER_LANGUAGE_REPOSITORY).getByUser(user.id)).resolves.toEqual([earlier, later]);
      });

      it('should update proficiency and refresh updatedAt', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        await repo(USER_LANGUAGE_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          proficiencyLevel: 'A1',
          createdAt: at(5),
        });

        const updated = await repo(USER_LANGUAGE_REPOSITORY).updateProficiency(user.id, english.id, 'B2');

        expect(updated).toMatchObject({ proficiencyLevel: 'B2', startedAt: at(5), createdAt: at(5) });
        expect(updated?.updatedAt.getTime()).toBeGreaterThan(at(5).getTime());
        await expect(repo(USER_LANGUAGE_REPOSITORY).get(user.id, english.id)).resolves.toEqual(updated);
        await expect(repo(USER_LANGUAGE_REPOSITORY).updateProficiency(user.id, spanish.id, 'B2')).resolves.toBeNull();
      });

      it('should delete idempotently', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        await repo(USER_LANGUAGE_REPOSITORY).create({ userId: user.id, languageId: english.id, proficiencyLevel: 'A1' });

        await expect(repo(USER_LANGUAGE_REPOSITORY).delete(user.id, english.id)).resolves.toBe(true);
        await expect(repo(USER_LANGUAGE_REPOSITORY).delete(user.id, english.id)).resolves.toBe(false);
      });
    });

    // ─── Vocabularies ──────────────────────────────────────────────────

    describe('vocabularies', () => {
      it('should allow one vocabulary per user and language', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        const vocabulary = await repo(USER_VOCABULARY_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          name: 'Daily words',
        });

        await expect(
          repo(USER_VOCABULARY_REPOSITORY).create({ userId: user.id, languageId: english.id, name: 'Again' }),
        ).rejects.toMatchObject({ constraint: 'unique' });
        await expect(repo(USER_VOCABULARY_REPOSITORY).getByUserAndLanguage(user.id, english.id)).resolves.toEqual(
          vocabulary,
        );
        await expect(repo(USER_VOCABULARY_REPOSITORY).getByUser(user.id)).resolves.toEqual([vocabulary]);
      });

      it('should rename a vocabulary', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        const vocabulary = await repo(USER_VOCABULARY_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          name: 'Daily words',
        });

        const renamed = await repo(USER_VOCABULARY_REPOSITORY).update(vocabulary.id, { name: 'Travel words' });
        expect(renamed).toMatchObject({ id: vocabulary.id, name: 'Travel words', createdAt: vocabulary.createdAt });
      });

      it('should remove the items of a deleted vocabulary', async () => {
        const user = await repo(USER_REPOSITORY).create(userDraft());
        const vocabulary = await repo(USER_VOCABULARY_REPOSITORY).create({
          userId: user.id,
          languageId: english.id,
          name: 'Daily words',
        });
        const item = await repo(USER_VOCABULARY_ITEM_REPOSITORY).create({ userVocabularyId: vocabulary.id, term: 'tree' });

        await expect(repo(USER_VOCABULARY_REPOSITORY).delete(vocabulary.id)).resolves.toBe(true);
        await expect(repo(USER_VOCABULARY_ITEM_REPOSITORY).getById(item.id)).resolves.toBeNull();
      });

      describe('items', () => {
        let vocabularyId: string;

        beforeEach(async () => {
          const user = await repo(USER_REPOSITORY).create(userDraft());
          const vocabulary = await repo(USER_VOCABULARY_REPOSITORY).create({
            userId: user.id,
            languageId: english.id,
            name: 'Daily words',
          });
          vocabularyId = vocabulary.id;
        });

        it('should apply item defaults', async () => {
          const item = await repo(USER_VOCABULARY_ITEM_REPOSITORY).create({ userVocabularyId: vocabularyId, term: 'tree' });

          expect(item).toMatchObject({
            status: 'NEW',
            timesReviewed: 0,
            confidenceLevel: 'A1',
            lemma: null,
            partOfSpeech: null,
            frequency: null,
          });
          await expect(repo(USER_VOCABULARY_ITEM_REPOSITORY).getByTerm(vocabularyId, 'tree')).resolves.toEqual(item);
        });

        it('should keep terms unique within a vocabulary', async () => {
          const user = await repo(USER_REPOSITORY).create(userDraft({ email: 'bo@example.com', username: 'bo' }));
          const other = await repo(USER_VOCABULARY_REPOSITORY).create({
            userId: user.id,
            languageId: english.id,
            name: 'Other',
          });
          await repo(USER_VOCABULARY_ITEM_REPOSITORY).create({ userVocabularyId: vocabularyId, term: 'tree' });

          await expect(
            repo(USER_VOCABULARY_ITEM_REPOSITORY).create({ userVocabularyId: vocabularyId, term: 'tree' }),
          ).rejects.toBeInstanceOf(ConflictError);
          await expect(
            repo(USER_VOCABULARY_ITEM_REPOSITORY).create({ userVocabularyId: other.id, term: 'tree' }),
          ).resolves.toMatchObject({ term: 'tree' });
        });

        it('should list items by vocabulary and status', async () => {
          const items = repo(USER_VOCABULARY_ITEM_REPOSITORY);
          const tree = await items.create({ userVocabularyId: vocabularyId, term: 'tree', createdAt: at(5) });
          const river = await items.create({
            userVocabularyId: vocabularyId,
            term: 'river',
            status: 'KNOWN',
            partOfSpeech: 'NOUN',
            frequency: 0.42,
            createdAt: at(6),
          });

          await expect(items.getByVocabulary(vocabularyId)).resolves.toEqual([tree, river]);
          await expect(items.getByStatus(vocabularyId, 'KNOWN')).resolves.toEqual([river]);
          await expect(items.getByStatus(vocabularyId, 'MASTERED')).resolves.toEqual([]);
        });

        it('should count reviews', async () => {
          const items = repo(USER_VOCABULARY_ITEM_REPOSITORY);
          const item = await items.create({ userVocabularyId: vocabularyId, term: 'tree', createdAt: at(5) });

          await expect(items.recordReview(item.id)).resolves.toMatchObject({ timesReviewed: 1 });
          const second = await items.recordReview(item.id);

          expect(second?.timesReviewed).toBe(2);
          expect(second?.updatedAt.getTime()).toBeGreaterThan(at(5).getTime());
          await expect(items.getById(item.id)).resolves.toMatchObject({ timesReviewed: 2 });
          await expect(items.recordReview('missing-id')).resolves.toBeNull();
        });

        it('should not lose concurrent reviews', async () => {
          const items = repo(USER_VOCABULARY_ITEM_REPOSITORY);
          const item = await items.create({ userVocabularyId: vocabularyId, term: 'tree' });

          await Promise.all([items.recordReview(item.id), items.recordReview(item.id), items.recordReview(item.id)]);

          await expect(items.getById(item.id)).resolves.toMatchObject({ timesReviewed: 3 });
        });
      });
    });
  });
}
