import { CreateDateColumn, Entity, Index, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Booking } from '../bookings/booking.entity';
import { User } from '../users/user.entity';

@Entity({ name: 'reminder_logs' })
@Index('reminder_logs_booking_uq', ['booking'], { unique: true })
export class ReminderLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => Booking, { nullable: false, onDelete: 'CASCADE' })
  booking!: Booking;

  @ManyToOne(() => User, { nullable: false, onDelete: 'CASCADE' })
  user!: User;

  @CreateDateColumn({ name: 'sent_at' })
  sentAt!: Date;
}
