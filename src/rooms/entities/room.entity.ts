import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../../common/database/decimal.transformer';
import { RoomRental } from './room-rental.entity';

export enum RoomStatus {
  ENABLED = 'enabled',
  DISABLED = 'disabled',
  UNDER_MAINTENANCE = 'under_maintenance',
}

@Entity('rooms')
export class Room {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  /** Owning organizer; the only non-admin allowed to approve rentals. */
  @Index()
  @Column({ type: 'varchar', length: 128 })
  organizerId!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255 })
  address!: string;

  @Column({ type: 'text', nullable: true })
  roomInfo!: string | null;

  @Column({ type: 'varchar', length: 512, default: '' })
  amenities!: string;

  @Column({ type: 'int' })
  capacity!: number;

  @Column({
    type: 'simple-enum',
    enum: RoomStatus,
    default: RoomStatus.ENABLED,
  })
  status!: RoomStatus;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  hourlyRate!: number | null;

  @Column({ type: Date, nullable: true })
  availabilityStart!: Date | null;

  @Column({ type: Date, nullable: true })
  availabilityEnd!: Date | null;

  @OneToMany(() => RoomRental, (rental) => rental.room)
  rentals!: RoomRental[];

  @CreateDateColumn()
  createdAt!: Date;
}
