import { LanguageEntity } from './language.entity';
import { TextEntity } from './text.entity';
import { TextTagAssociationEntity, TextTagEntity } from './text-tag.entity';
import { UserLanguageEntity } from './user-language.entity';
import { UserEntity } from './user.entity';
import { UserVocabularyEntity, UserVocabularyItemEntity } from './vocabulary.entity';

export {
  LanguageEntity,
  TextEntity,
  TextTagAssociationEntity,
  TextTagEntity,
  UserEntity,
  UserLanguageEntity,
  UserVocabularyEntity,
  UserVocabularyItemEntity,
};

/** Every table of the relational schema, for DataSource registration. */
export const TYPEORM_ENTITIES = [
  LanguageEntity,
  UserEntity,
  UserLanguageEntity,
  TextEntity,
  TextTagEntity,
  TextTagAssociationEntity,
  UserVocabularyEntity,
  UserVocabularyItemEntity,
];
