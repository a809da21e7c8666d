import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

export const COURSE_LEVELS = ['UG', 'PG', 'PhD', 'Other'] as const;
export type CourseLevel = (typeof COURSE_LEVELS)[number];

@Entity({ name: 'courses' })
@Index('courses_code_uq', ['code'], { unique: true })
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20 })
  code!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ name: 'short_name', type: 'varchar', length: 50, nullable: true })
  shortName?: string | null;

  @Column({ type: 'varchar', length: 20 })
  level!: CourseLevel;

  @Column({ type: 'varchar', length: 100 })
  department!: string;

  @Column({ name: 'duration_years', type: 'int', nullable: true })
  durationYears?: number | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ type: 'varchar', length: 500, nullable: true })
  description?: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
