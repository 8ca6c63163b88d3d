import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../../common/database/decimal.transformer';
import { Room } from './room.entity';

export enum RentalStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
  CANCELLED = 'cancelled',
  COMPLETED = 'completed',
}

/** Statuses that hold a room's time slot. */
export const SLOT_HOLDING_STATUSES: readonly RentalStatus[] = [
  RentalStatus.PENDING,
  RentalStatus.APPROVED,
];

@Entity('room_rentals')
@Index(['roomId', 'status'])
export class RoomRental {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  roomId!: string;

  @ManyToOne(() => Room, (room) => room.rentals, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'roomId' })
  room!: Room;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  renterId!: string;

  /** Inclusive start of the booked range. */
  @Column()
  startTime!: Date;

  /** Exclusive end of the booked range. */
  @Column()
  endTime!: Date;

  @Column({
    type: 'simple-enum',
    enum: RentalStatus,
    default: RentalStatus.PENDING,
  })
  status!: RentalStatus;

  @Column({ type: 'text', nullable: true })
  purpose!: string | null;

  @Column({ type: 'int', nullable: true })
  expectedAttendees!: number | null;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  totalCost!: number | null;

  /** Rejection or admin-cancellation reason, kept for audit. */
  @Column({ type: 'text', nullable: true })
  adminNotes!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
