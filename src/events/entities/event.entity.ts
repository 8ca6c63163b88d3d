import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

@Entity('events')
export class Event {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  location!: string | null;

  /** Ticket tokens expire 24h after this instant. */
  @Column()
  startDate!: Date;

  @Column()
  endDate!: Date;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  organizerId!: string;

  /**
   * Maximum number of tickets that can be claimed.
   * NULL means the event has no capacity limit.
   */
  @Column({ type: 'int', nullable: true, default: null })
  maxAttendees!: number | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
