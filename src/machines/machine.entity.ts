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

export const MACHINE_STATUSES = ['available', 'maintenance', 'disabled'] as const;
export type MachineStatus = (typeof MACHINE_STATUSES)[number];

export type TimeRange = { start: string; end: string };

@Entity({ name: 'machines' })
@Index('machines_name_uq', ['name'], { unique: true })
@Index('machines_code_uq', ['code'], { unique: true })
export class Machine {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 20 })
  code!: string;

  @ManyToOne(() => Building, { nullable: false })
  building!: Building;

  @Column({ type: 'varchar', length: 16, default: 'available' })
  status!: MachineStatus;

  @Column({ name: 'slot_count', type: 'int' })
  slotCount!: number;

  // ordered; entry i describes slot i + 1
  @Column({ name: 'slot_template', type: 'simple-json' })
  slotTemplate!: TimeRange[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
