import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { UserRole } from '../enums/user-role.enum';

/**
 * Read-side view of a campus account. Accounts are created and approved by
 * the identity service; this core only looks them up for role checks.
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'simple-enum', enum: UserRole })
  role!: UserRole;

  @CreateDateColumn()
  createdAt!: Date;
}
