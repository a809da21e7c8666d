import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';

export const USER_ROLES = ['user', 'guest', 'admin', 'superadmin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

@Entity({ name: 'users' })
@Index('users_email_uq', ['email'], { unique: true })
@Index('users_username_uq', ['username'], { unique: true })
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  username!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 50 })
  firstName!: string;

  @Column({ name: 'middle_name', type: 'varchar', length: 50, nullable: true })
  middleName?: string | null;

  @Column({ name: 'last_name', type: 'varchar', length: 50, nullable: true })
  lastName?: string | null;

  @Column({ type: 'varchar', length: 160 })
  email!: string;

  @Column({ name: 'password_hash', type: 'varchar', length: 255 })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 12, default: 'user' })
  role!: UserRole;

  @ManyToOne(() => Building, { nullable: false })
  building!: Building;

  @ManyToOne(() => Course, { nullable: true })
  course?: Course | null;

  @Column({ name: 'contact_no', type: 'varchar', length: 20, nullable: true })
  contactNo?: string | null;

  @Column({ name: 'room_no', type: 'varchar', length: 20, nullable: true })
  roomNo?: string | null;

  // guests only
  @Column({ name: 'host_name', type: 'varchar', length: 120, nullable: true })
  hostName?: string | null;

  @Column({ name: 'departure_date', type: 'date', nullable: true })
  departureDate?: string | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ name: 'reminder_enabled', type: 'boolean', default: false })
  reminderEnabled!: boolean;

  @Column({ name: 'reminder_lead_hours', type: 'int', default: 2 })
  reminderLeadHours!: number;

  @Column({ name: 'reminder_email', type: 'varchar', length: 160, nullable: true })
  reminderEmail?: string | null;

  @Column({ name: 'last_seen_at', type: Date, nullable: true })
  lastSeenAt?: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
