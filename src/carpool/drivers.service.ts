import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';

import {
  Driver,
  DriverStatus,
  DriverType,
  MAX_DRIVER_CAPACITY,
  MIN_DRIVER_CAPACITY,
} from './entities/driver.entity';
import { DriverFlag, DriverFlagKind } from './entities/driver-flag.entity';
import { CarpoolOffer, OfferStatus } from './entities/carpool-offer.entity';
import { RegisterDriverDto } from './dto/register-driver.dto';
import { UpdateDriverDto } from './dto/update-driver.dto';
import { UsersService } from '../users/users.service';
import { UserRole } from '../users/enums/user-role.enum';
import { AuditService } from '../audit/audit.service';
import { AuditAction } from '../audit/entities/audit-log.entity';
import { runSerializable } from '../common/database/transaction';
import { fail, ok, Result } from '../common/result';

export interface SuspendedDriver {
  driver: Driver;
  flag: DriverFlag;
  cancelledOfferIds: string[];
}

/** Which account role may register as which kind of driver. */
const ROLE_FOR_DRIVER_TYPE: Record<DriverType, UserRole> = {
  [DriverType.STUDENT]: UserRole.STUDENT,
  [DriverType.ORGANIZER]: UserRole.ORGANIZER,
};

function capacityError(capacity: number): string | null {
  return capacity < MIN_DRIVER_CAPACITY || capacity > MAX_DRIVER_CAPACITY
    ? `Capacity must be between ${MIN_DRIVER_CAPACITY} and ${MAX_DRIVER_CAPACITY}`
    : null;
}

@Injectable()
export class DriversService {
  private readonly logger = new Logger(DriversService.name);

  constructor(
    @InjectRepository(Driver)
    private readonly driverRepo: Repository<Driver>,
    @InjectRepository(DriverFlag)
    private readonly flagRepo: Repository<DriverFlag>,
    private readonly usersService: UsersService,
    private readonly auditService: AuditService,
    private readonly dataSource: DataSource,
  ) {}

  async registerDriver(
    userId: string,
    dto: RegisterDriverDto,
  ): Promise<Result<Driver>> {
    const user = await this.usersService.findById(userId);
    if (!user) return fail('not_found', 'User not found');

    const result = await runSerializable(this.dataSource, async (manager) => {
      const drivers = manager.getRepository(Driver);

      const existing = await drivers.findOne({ where: { userId } });
      if (existing) {
        return fail('conflict', 'User is already registered as a driver');
      }

      if (user.role !== ROLE_FOR_DRIVER_TYPE[dto.driverType]) {
        return fail(
          'forbidden',
          `Only ${dto.driverType}s can register as ${dto.driverType} drivers`,
        );
      }

      const invalidCapacity = capacityError(dto.capacity);
      if (invalidCapacity) return fail('validation', invalidCapacity);

      const driver = await drivers.save(
        drivers.create({
          userId,
          capacity: dto.capacity,
          vehicleType: dto.vehicleType,
          driverType: dto.driverType,
          licensePlate: dto.licensePlate ?? null,
          accessibilityFeatures: dto.accessibilityFeatures ?? '',
          status: DriverStatus.PENDING,
        }),
      );

      return ok(
        driver,
        'Driver registration successful. Pending admin approval.',
      );
    });

    if (result.success) {
      this.logger.log(
        `Driver registered: driverId=${result.data.id} user=${userId}`,
      );
    }
    return result;
  }

  async updateDriver(
    driverId: string,
    userId: string,
    dto: UpdateDriverDto,
  ): Promise<Result<Driver>> {
    const driver = await this.driverRepo.findOne({ where: { id: driverId } });
    if (!driver) return fail('not_found', 'Driver not found');

    if (driver.userId !== userId) {
      return fail('forbidden', 'Only the driver can update this profile');
    }

    if (dto.capacity !== undefined) {
      const invalidCapacity = capacityError(dto.capacity);
      if (invalidCapacity) return fail('validation', invalidCapacity);
      driver.capacity = dto.capacity;
    }
    if (dto.vehicleType !== undefined) driver.vehicleType = dto.vehicleType;
    if (dto.licensePlate !== undefined) driver.licensePlate = dto.licensePlate;
    if (dto.accessibilityFeatures !== undefined) {
      driver.accessibilityFeatures = dto.accessibilityFeatures;
    }

    const saved = await this.driverRepo.save(driver);
    this.logger.log(`Driver profile updated: driverId=${driverId}`);
    return ok(saved, 'Driver profile updated successfully');
  }

  approveDriver(driverId: string, adminId: string): Promise<Result<Driver>> {
    return this.activate(driverId, adminId, {
      from: DriverStatus.PENDING,
      action: AuditAction.DRIVER_APPROVED,
      refusal: 'Only pending drivers can be approved',
      message: 'Driver approved successfully',
    });
  }

  reinstateDriver(driverId: string, adminId: string): Promise<Result<Driver>> {
    return this.activate(driverId, adminId, {
      from: DriverStatus.SUSPENDED,
      action: AuditAction.DRIVER_REINSTATED,
      refusal: 'Only suspended drivers can be reinstated',
      message: 'Driver unsuspended successfully',
    });
  }

  /**
   * Suspends a driver, appends one flag to its log and cancels its active
   * offers in a single transaction. Calling it again on a suspended driver
   * adds another flag.
   */
  async suspendDriver(
    driverId: string,
    adminId: string,
    reason: string,
  ): Promise<Result<SuspendedDriver>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const drivers = manager.getRepository(Driver);
      const driver = await drivers.findOne({ where: { id: driverId } });
      if (!driver) return fail('not_found', 'Driver not found');

      driver.status = DriverStatus.SUSPENDED;
      const saved = await drivers.save(driver);

      const flags = manager.getRepository(DriverFlag);
      const flag = await flags.save(
        flags.create({ driverId, kind: DriverFlagKind.SUSPENDED, reason }),
      );

      const offers = manager.getRepository(CarpoolOffer);
      const active = await offers.find({
        where: { driverId, status: OfferStatus.ACTIVE },
      });
      for (const offer of active) {
        offer.status = OfferStatus.CANCELLED;
      }
      await offers.save(active);

      const cancelledOfferIds = active.map((offer) => offer.id);

      await this.auditService.log(
        {
          action: AuditAction.DRIVER_SUSPENDED,
          userId: adminId,
          resourceId: driverId,
          meta: { reason, cancelledOfferIds },
        },
        manager,
      );

      return ok(
        { driver: saved, flag, cancelledOfferIds },
        'Driver suspended successfully',
      );
    });

    if (result.success) {
      this.logger.log(
        `Driver suspended: driverId=${driverId} cancelledOffers=${result.data.cancelledOfferIds.length}`,
      );
    }
    return result;
  }

  // ─── Listings ──────────────────────────────────────────────────────────────

  getAllDrivers(status?: DriverStatus): Promise<Driver[]> {
    return this.driverRepo.find({
      where: status ? { status } : {},
      order: { createdAt: 'DESC' },
    });
  }

  /** Drivers with at least one entry in their flag log. */
  async getFlaggedDrivers(): Promise<Driver[]> {
    const flags = await this.flagRepo.find({ select: { driverId: true } });
    const driverIds = [...new Set(flags.map((flag) => flag.driverId))];
    if (driverIds.length === 0) return [];

    return this.driverRepo.find({
      where: { id: In(driverIds) },
      relations: { flags: true },
      order: { createdAt: 'DESC' },
    });
  }

  getDriverForUser(userId: string): Promise<Driver | null> {
    return this.driverRepo.findOne({ where: { userId } });
  }

  // ─── Private helpers ───────────────────────────────────────────────────────

  private async activate(
    driverId: string,
    adminId: string,
    rule: {
      from: DriverStatus;
      action: AuditAction;
      refusal: string;
      message: string;
    },
  ): Promise<Result<Driver>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const drivers = manager.getRepository(Driver);
      const driver = await drivers.findOne({ where: { id: driverId } });
      if (!driver) return fail('not_found', 'Driver not found');

      if (driver.status !== rule.from) {
        return fail('validation', rule.refusal);
      }

      driver.status = DriverStatus.ACTIVE;
      const saved = await drivers.save(driver);

      await this.auditService.log(
        { action: rule.action, userId: adminId, resourceId: driverId },
        manager,
      );

      return ok(saved, rule.message);
    });

    if (result.success) {
      this.logger.log(`Driver activated: driverId=${driverId} (${rule.action})`);
    }
    return result;
  }
}
