import { Column, Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { TextEntity } from './text.entity';

@Entity('TextTag')
export class TextTagEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 50, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  description!: string | null;
}

/** Junction row; both sides cascade on delete. */
@Entity('TextTagAssociation')
export class TextTagAssociationEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  textId!: string;

  @PrimaryColumn({ type: 'varchar', length: 36 })
  tagId!: string;

  @ManyToOne(() => TextEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'textId' })
  text?: TextEntity;

  @ManyToOne(() => TextTagEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'tagId' })
  tag?: TextTagEntity;
}
