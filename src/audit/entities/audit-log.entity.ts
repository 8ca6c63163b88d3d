import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

export enum AuditAction {
  // Rentals
  RENTAL_APPROVED = 'RENTAL_APPROVED',
  RENTAL_REJECTED = 'RENTAL_REJECTED',
  RENTAL_CANCELLED = 'RENTAL_CANCELLED',
  RENTAL_ADMIN_CANCELLED = 'RENTAL_ADMIN_CANCELLED',
  RENTAL_COMPLETED = 'RENTAL_COMPLETED',

  // Rooms
  ROOM_DISABLED = 'ROOM_DISABLED',
  ROOM_ENABLED = 'ROOM_ENABLED',

  // Drivers
  DRIVER_APPROVED = 'DRIVER_APPROVED',
  DRIVER_SUSPENDED = 'DRIVER_SUSPENDED',
  DRIVER_REINSTATED = 'DRIVER_REINSTATED',

  // Carpool
  PASSENGER_REASSIGNED = 'PASSENGER_REASSIGNED',

  // Tickets
  TICKET_REDEEMED = 'TICKET_REDEEMED',
}

@Entity('audit_logs')
export class AuditLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'varchar', length: 64 })
  action!: string;

  @Index()
  @Column({ type: 'varchar', length: 128 })
  userId!: string;

  @Column({ nullable: true, type: 'varchar', length: 128 })
  resourceId!: string | null;

  @Column({ type: 'simple-json', nullable: true })
  metadata!: Record<string, unknown> | null;

  @CreateDateColumn()
  createdAt!: Date;
}
