import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { User } from '../users/user.entity';

export const EVENT_ACTIONS = [
  'auth.login',
  'auth.register',
  'booking.create',
  'booking.cancel',
  'admin.user.create',
  'admin.user.role',
  'admin.user.active',
  'admin.user.password',
  'admin.user.delete',
  'admin.api_token.issue',
  'admin.api_token.revoke',
  'admin.data.import',
  'admin.reminders.start',
  'admin.reminders.stop',
  'admin.reminders.run',
] as const;
export type EventAction = (typeof EVENT_ACTIONS)[number];

export const EVENT_CATEGORIES = ['auth', 'booking', 'admin'] as const;
export type EventCategory = (typeof EVENT_CATEGORIES)[number];

export const EVENT_OUTCOMES = ['success', 'error'] as const;
export type EventOutcome = (typeof EVENT_OUTCOMES)[number];

export type EventDetails = Record<string, string | number | boolean | null>;

export function categoryOf(action: EventAction): EventCategory {
  if (action.startsWith('auth.')) return 'auth';
  if (action.startsWith('booking.')) return 'booking';
  return 'admin';
}

@Entity({ name: 'audit_events' })
@Index('audit_events_created_idx', ['createdAt'])
@Index('audit_events_category_idx', ['category', 'createdAt'])
export class EventLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // kept when the actor's account is deleted, just unlinked
  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'actor_id' })
  actor?: User | null;

  @Column({ type: 'varchar', length: 16 })
  category!: EventCategory;

  @Column({ type: 'varchar', length: 48 })
  action!: EventAction;

  @Column({ type: 'varchar', length: 16 })
  outcome!: EventOutcome;

  // booking, user or token the event is about
  @Column({ name: 'subject_id', type: 'varchar', length: 36, nullable: true })
  subjectId?: string | null;

  @Column({ type: 'varchar', length: 240, nullable: true })
  message?: string | null;

  @Column({ type: 'simple-json', nullable: true })
  details?: EventDetails | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
