import { Column, CreateDateColumn, Entity, Index, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Machine } from '../machines/machine.entity';
import { User } from '../users/user.entity';

@Entity({ name: 'bookings' })
@Index('bookings_slot_per_day_uq', ['machine', 'date', 'slotNumber'], { unique: true })
@Index('bookings_user_date_idx', ['user', 'date'])
export class Booking {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // machines with history are disabled, never deleted
  @ManyToOne(() => Machine, { nullable: false, onDelete: 'RESTRICT' })
  machine!: Machine;

  // calendar day (YYYY-MM-DD) in the configured timezone
  @Column({ type: 'date' })
  date!: string;

  @Column({ name: 'slot_number', type: 'int' })
  slotNumber!: number;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  user!: User;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
