import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Driver } from './driver.entity';
import { CarpoolPassenger } from './carpool-passenger.entity';

export enum OfferStatus {
  ACTIVE = 'active',
  FULL = 'full',
  CANCELLED = 'cancelled',
  COMPLETED = 'completed',
}

@Entity('carpool_offers')
@Index(['driverId', 'eventId'])
export class CarpoolOffer {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  driverId!: string;

  @ManyToOne(() => Driver, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'driverId' })
  driver!: Driver;

  @Index()
  @Column({ type: 'varchar', length: 36 })
  eventId!: string;

  /** Driver capacity when the offer was created. */
  @Column({ type: 'int' })
  totalSeats!: number;

  /** Always `totalSeats` minus the confirmed passengers. */
  @Column({ type: 'int' })
  seatsAvailable!: number;

  @Column({ type: 'text' })
  departureInfo!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  departureAddress!: string | null;

  @Column({ type: 'float', nullable: true })
  latitude!: number | null;

  @Column({ type: 'float', nullable: true })
  longitude!: number | null;

  @Column()
  departureTime!: Date;

  @Column({
    type: 'simple-enum',
    enum: OfferStatus,
    default: OfferStatus.ACTIVE,
  })
  status!: OfferStatus;

  @OneToMany(() => CarpoolPassenger, (passenger) => passenger.offer)
  passengers!: CarpoolPassenger[];

  @CreateDateColumn()
  createdAt!: Date;
}
