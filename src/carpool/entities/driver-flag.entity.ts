import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Driver } from './driver.entity';

export enum DriverFlagKind {
  SUSPENDED = 'suspended',
}

/** Append-only record of moderation actions taken against a driver. */
@Entity('driver_flags')
export class DriverFlag {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'varchar', length: 36 })
  driverId!: string;

  @ManyToOne(() => Driver, (driver) => driver.flags, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'driverId' })
  driver!: Driver;

  @Column({ type: 'simple-enum', enum: DriverFlagKind })
  kind!: DriverFlagKind;

  @Column({ type: 'text' })
  reason!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
