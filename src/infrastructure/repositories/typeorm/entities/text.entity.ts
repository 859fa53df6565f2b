import { Check, Column, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';

import { PROFICIENCY_LEVELS, type ProficiencyLevel } from '../../../../domain/models/enums';
import { oneOf } from './check-constraint';
import { LanguageEntity } from './language.entity';
import { UserEntity } from './user.entity';

@Entity('Text')
@Check('CHK_Text_proficiencyLevel', oneOf('proficiencyLevel', PROFICIENCY_LEVELS))
@Check('CHK_Text_wordCount', '"wordCount" >= 0')
export class TextEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'text' })
  content!: string;

  @Index()
  @Column({ type: 'varchar', length: 36 })
  languageId!: string;

  @ManyToOne(() => LanguageEntity, { onDelete: 'RESTRICT', nullable: false })
  @JoinColumn({ name: 'languageId' })
  language?: LanguageEntity;

  @Index()
  @Column({ type: 'varchar', length: 36, nullable: true })
  userId!: string | null;

  @ManyToOne(() => UserEntity, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'userId' })
  user?: UserEntity | null;

  @Column({ type: 'varchar', length: 2 })
  proficiencyLevel!: ProficiencyLevel;

  @Column({ type: 'integer' })
  wordCount!: number;

  @Column({ type: 'boolean', default: true })
  isPublic!: boolean;

  @Column({ type: 'varchar', length: 255, nullable: true })
  source!: string | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;
}
