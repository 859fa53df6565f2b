import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('Language')
export class LanguageEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 10, unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 100 })
  nativeName!: string;

  @Column({ type: 'datetime' })
  createdAt!: Date;
}
