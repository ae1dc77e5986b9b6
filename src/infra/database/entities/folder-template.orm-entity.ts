/**
 * FolderTemplate / FolderTemplateNode TypeORM Entity
 */
import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
  ManyToOne,
  OneToMany,
  JoinColumn,
} from 'typeorm';
import { EntityType } from '../../../domain/hierarchy/enums/entity-type.enum';

@Entity('folder_templates')
@Index(['entityType', 'active'])
export class FolderTemplateOrmEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, unique: true })
  name!: string;

  @Column({ type: 'varchar', length: 32 })
  entityType!: EntityType;

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @OneToMany(() => FolderTemplateNodeOrmEntity, (node) => node.template)
  nodes?: FolderTemplateNodeOrmEntity[];
}

@Entity('folder_template_nodes')
export class FolderTemplateNodeOrmEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  @Index()
  templateId!: number;

  @ManyToOne(() => FolderTemplateOrmEntity, (template) => template.nodes, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'templateId' })
  template?: FolderTemplateOrmEntity;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  /** 형제 노드 정렬 키 */
  @Column({ name: 'sortOrder', type: 'int', default: 0 })
  order!: number;

  @Column({ type: 'int', nullable: true })
  parentId!: number | null;

  @ManyToOne(() => FolderTemplateNodeOrmEntity, { onDelete: 'CASCADE', nullable: true })
  @JoinColumn({ name: 'parentId' })
  parent?: FolderTemplateNodeOrmEntity | null;
}
