import { Check, Column, Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';

import { PROFICIENCY_LEVELS, type ProficiencyLevel } from '../../../../domain/models/enums';
import { oneOf } from './check-constraint';
import { LanguageEntity } from './language.entity';
import { UserEntity } from './user.entity';

@Entity('UserLanguage')
@Check('CHK_UserLanguage_proficiencyLevel', oneOf('proficiencyLevel', PROFICIENCY_LEVELS))
export class UserLanguageEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  userId!: string;

  @PrimaryColumn({ type: 'varchar', length: 36 })
  languageId!: string;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: UserEntity;

  @ManyToOne(() => LanguageEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'languageId' })
  language?: LanguageEntity;

  @Column({ type: 'varchar', length: 2 })
  proficiencyLevel!: ProficiencyLevel;

  @Column({ type: 'datetime' })
  startedAt!: Date;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;
}
