import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';

import { ConflictError } from '../../domain/errors/repository.errors';
import type { TextTag } from '../../domain/models/text-tag.model';
import { TEXT_TAG_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { ITextTagRepository } from '../../domain/repositories/text-tag.repository.interface';
import { createSilentLogger } from '../../../test/helpers/silent-logger';
import { AppLogger } from '../logging/app-logger.service';
import { TagsService } from './tags.service';

describe('TagsService', () => {
  let service: TagsService;
  let tags: jest.Mocked<ITextTagRepository>;

  const grammar: TextTag = { id: 'tag-1', name: 'grammar', description: null };

  beforeEach(async () => {
    tags = {
      create: jest.fn(),
      getById: jest.fn(),
      getAll: jest.fn(),
      update: jest.fn(),
      delete: jest.fn(),
      exists: jest.fn(),
      getByName: jest.fn(),
      nameExists: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TagsService,
        { provide: TEXT_TAG_REPOSITORY, useValue: tags },
        { provide: AppLogger, useValue: createSilentLogger() },
      ],
    }).compile();

    service = module.get(TagsService);
  });

  describe('create', () => {
    it('should store a missing description as null', async () => {
      tags.nameExists.mockResolvedValue(false);
      tags.create.mockResolvedValue(grammar);

      await expect(service.create({ name: 'grammar' })).resolves.toBe(grammar);
      expect(tags.create).toHaveBeenCalledWith({ name: 'grammar', description: null });
    });

    it('should reject a name that exists', async () => {
      tags.nameExists.mockResolvedValue(true);

      await expect(service.create({ name: 'grammar' })).rejects.toThrow(
        new ConflictException('Tag "grammar" already exists'),
      );
      expect(tags.create).not.toHaveBeenCalled();
    });

    it('should report a racing duplicate as a conflict', async () => {
      tags.nameExists.mockResolvedValue(false);
      tags.create.mockRejectedValue(
        new ConflictError('TextTag violates a unique constraint', {
          entity: 'TextTag',
          operation: 'create',
          constraint: 'unique',
        }),
      );

      await expect(service.create({ name: 'grammar' })).rejects.toThrow('Tag "grammar" already exists');
    });
  });

  describe('get', () => {
    it('should throw NotFound for an unknown tag', async () => {
      tags.getById.mockResolvedValue(null);

      await expect(service.get('missing')).rejects.toThrow(new NotFoundException('Tag with ID "missing" not found'));
    });
  });

  describe('list', () => {
    it('should pass the page through', async () => {
      tags.getAll.mockResolvedValue([grammar]);

      await expect(service.list({ skip: 0, limit: 20 })).resolves.toEqual([grammar]);
      expect(tags.getAll).toHaveBeenCalledWith({ skip: 0, limit: 20 });
    });
  });

  describe('update', () => {
    it('should only check the name when it changes', async () => {
      tags.getById.mockResolvedValue(grammar);
      tags.update.mockResolvedValue({ ...grammar, description: 'Sentence structure' });

      await service.update('tag-1', { name: 'grammar', description: 'Sentence structure' });

      expect(tags.nameExists).not.toHaveBeenCalled();
      expect(tags.update).toHaveBeenCalledWith('tag-1', { name: 'grammar', description: 'Sentence structure' });
    });

    it('should reject a rename onto an existing tag', async () => {
      tags.getById.mockResolvedValue(grammar);
      tags.nameExists.mockResolvedValue(true);

      await expect(service.update('tag-1', { name: 'travel' })).rejects.toThrow('Tag "travel" already exists');
    });

    it('should throw NotFound for an unknown tag', async () => {
      tags.getById.mockResolvedValue(null);

      await expect(service.update('missing', { name: 'travel' })).rejects.toThrow(NotFoundException);
      expect(tags.update).not.toHaveBeenCalled();
    });
  });

  describe('delete', () => {
    it('should throw NotFound when nothing was deleted', async () => {
      tags.delete.mockResolvedValue(false);

      await expect(service.delete('missing')).rejects.toThrow('Tag with ID "missing" not found');
    });

    it('should delete an existing tag', async () => {
      tags.delete.mockResolvedValue(true);

      await expect(service.delete('tag-1')).resolves.toBeUndefined();
    });
  });
});
