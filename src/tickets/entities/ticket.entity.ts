import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

export type TicketStatus = 'valid' | 'used';

@Entity({ name: 'tickets' })
@Index(['eventId', 'ownerId'], { unique: true })
export class TicketEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  eventId!: string;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  ownerId!: string;

  /**
   * Opaque code printed on the ticket and embedded in its signed token.
   * The token itself is never stored; it is recomputed from these columns.
   */
  @Index({ unique: true })
  @Column({ type: 'varchar', length: 64 })
  uniqueCode!: string;

  @Column({ type: 'varchar', length: 16, default: 'valid' })
  status!: TicketStatus;

  @Column({ type: Date, nullable: true })
  redeemedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}
