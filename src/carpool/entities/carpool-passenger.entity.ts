import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CarpoolOffer } from './carpool-offer.entity';

export enum PassengerStatus {
  CONFIRMED = 'confirmed',
  CANCELLED = 'cancelled',
}

@Entity('carpool_passengers')
@Index(['offerId', 'passengerId'])
export class CarpoolPassenger {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 36 })
  offerId!: string;

  @ManyToOne(() => CarpoolOffer, (offer) => offer.passengers, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'offerId' })
  offer!: CarpoolOffer;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  passengerId!: string;

  @Column({
    type: 'simple-enum',
    enum: PassengerStatus,
    default: PassengerStatus.CONFIRMED,
  })
  status!: PassengerStatus;

  @Column({ type: 'varchar', length: 255, nullable: true })
  pickupLocation!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn()
  joinedAt!: Date;
}
