import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { DriverFlag } from './driver-flag.entity';

export enum VehicleType {
  MINI = 'mini',
  SEDAN = 'sedan',
  SUV = 'suv',
  VAN = 'van',
  BUS = 'bus',
}

export enum DriverType {
  STUDENT = 'student',
  ORGANIZER = 'organizer',
}

export enum DriverStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  SUSPENDED = 'suspended',
}

export const MIN_DRIVER_CAPACITY = 1;
export const MAX_DRIVER_CAPACITY = 50;

@Entity('drivers')
export class Driver {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 128, unique: true })
  userId!: string;

  /** Passenger seats, driver excluded. */
  @Column({ type: 'int' })
  capacity!: number;

  @Column({ type: 'simple-enum', enum: VehicleType })
  vehicleType!: VehicleType;

  @Column({ type: 'simple-enum', enum: DriverType })
  driverType!: DriverType;

  @Column({ type: 'varchar', length: 32, nullable: true })
  licensePlate!: string | null;

  @Column({ type: 'varchar', length: 512, default: '' })
  accessibilityFeatures!: string;

  @Column({
    type: 'simple-enum',
    enum: DriverStatus,
    default: DriverStatus.PENDING,
  })
  status!: DriverStatus;

  @OneToMany(() => DriverFlag, (flag) => flag.driver)
  flags!: DriverFlag[];

  @CreateDateColumn()
  createdAt!: Date;
}
