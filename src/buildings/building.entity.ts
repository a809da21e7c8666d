import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity({ name: 'buildings' })
@Index('buildings_name_uq', ['name'], { unique: true })
@Index('buildings_code_uq', ['code'], { unique: true })
export class Building {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  // short tag used on notices, e.g. "RSH"
  @Column({ type: 'varchar', length: 20, nullable: true })
  code?: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
