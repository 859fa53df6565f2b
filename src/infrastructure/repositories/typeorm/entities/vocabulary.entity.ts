import { Check, Column, Entity, JoinColumn, ManyToOne, PrimaryColumn, Unique } from 'typeorm';

import {
  PARTS_OF_SPEECH,
  PROFICIENCY_LEVELS,
  VOCABULARY_STATUSES,
  type PartOfSpeech,
  type ProficiencyLevel,
  type VocabularyStatus,
} from '../../../../domain/models/enums';
import { oneOf } from './check-constraint';
import { LanguageEntity } from './language.entity';
import { UserEntity } from './user.entity';

@Entity('UserVocabulary')
@Unique('UQ_UserVocabulary_user_language', ['userId', 'languageId'])
export class UserVocabularyEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  userId!: string;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: UserEntity;

  @Column({ type: 'varchar', length: 36 })
  languageId!: string;

  @ManyToOne(() => LanguageEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'languageId' })
  language?: LanguageEntity;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;
}

@Entity('UserVocabularyItem')
@Unique('UQ_UserVocabularyItem_vocabulary_term', ['userVocabularyId', 'term'])
@Check('CHK_UserVocabularyItem_partOfSpeech', oneOf('partOfSpeech', PARTS_OF_SPEECH, true))
@Check('CHK_UserVocabularyItem_status', oneOf('status', VOCABULARY_STATUSES))
@Check('CHK_UserVocabularyItem_confidenceLevel', oneOf('confidenceLevel', PROFICIENCY_LEVELS))
@Check('CHK_UserVocabularyItem_timesReviewed', '"timesReviewed" >= 0')
export class UserVocabularyItemEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  userVocabularyId!: string;

  @ManyToOne(() => UserVocabularyEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userVocabularyId' })
  userVocabulary?: UserVocabularyEntity;

  @Column({ type: 'varchar', length: 100 })
  term!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  lemma!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  stem!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  partOfSpeech!: PartOfSpeech | null;

  @Column({ type: 'real', nullable: true })
  frequency!: number | null;

  @Column({ type: 'varchar', length: 20 })
  status!: VocabularyStatus;

  @Column({ type: 'integer', default: 0 })
  timesReviewed!: number;

  @Column({ type: 'varchar', length: 2 })
  confidenceLevel!: ProficiencyLevel;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;
}
