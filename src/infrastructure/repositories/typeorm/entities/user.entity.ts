import { Column, Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { LanguageEntity } from './language.entity';

@Entity('User')
export class UserEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 50, unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 255 })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 100 })
  firstName!: string;

  @Column({ type: 'varchar', length: 100 })
  lastName!: string;

  @Column({ type: 'varchar', length: 36 })
  nativeLanguageId!: string;

  @ManyToOne(() => LanguageEntity, { onDelete: 'RESTRICT', nullable: false })
  @JoinColumn({ name: 'nativeLanguageId' })
  nativeLanguage?: LanguageEntity;

  @Column({ type: 'varchar', length: 36 })
  currentLanguageId!: string;

  @ManyToOne(() => LanguageEntity, { onDelete: 'RESTRICT', nullable: false })
  @JoinColumn({ name: 'currentLanguageId' })
  currentLanguage?: LanguageEntity;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;

  @Column({ type: 'datetime', nullable: true })
  lastActiveAt!: Date | null;
}
