import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';

import { Room, RoomStatus } from './entities/room.entity';
import {
  RentalStatus,
  RoomRental,
  SLOT_HOLDING_STATUSES,
} from './entities/room-rental.entity';
import { rentalStateMachine } from './state/rental-state';
import { durationInHours, formatUtc, TimeRange } from './utils/time-range';
import { findOverlappingRental } from './utils/rental-conflicts';
import { AuditService } from '../audit/audit.service';
import { AuditAction } from '../audit/entities/audit-log.entity';
import { NotificationsService } from '../notifications/notifications.service';
import { runSerializable } from '../common/database/transaction';
import { runAfterCommit } from '../common/utils/after-commit';
import { fail, ok, Result } from '../common/result';

export interface RentalRequest {
  startTime: Date;
  endTime: Date;
  purpose?: string;
  expectedAttendees?: number;
}

@Injectable()
export class RentalsService {
  private readonly logger = new Logger(RentalsService.name);

  constructor(
    @InjectRepository(RoomRental)
    private readonly rentalRepo: Repository<RoomRental>,
    private readonly auditService: AuditService,
    private readonly notificationsService: NotificationsService,
    private readonly dataSource: DataSource,
  ) {}

  // ─── Requests ──────────────────────────────────────────────────────────────

  async requestRental(
    roomId: string,
    renterId: string,
    request: RentalRequest,
  ): Promise<Result<RoomRental>> {
    const range: TimeRange = { start: request.startTime, end: request.endTime };

    const result = await runSerializable(this.dataSource, async (manager) => {
      const room = await manager.findOne(Room, { where: { id: roomId } });
      if (!room) return fail('not_found', 'Room not found');

      if (room.status !== RoomStatus.ENABLED) {
        return fail('validation', 'Room is currently disabled');
      }

      if (range.end.getTime() <= range.start.getTime()) {
        return fail('validation', 'End time must be after start time');
      }

      if (range.start.getTime() <= Date.now()) {
        return fail('validation', 'Cannot book time in the past');
      }

      if (
        room.availabilityStart &&
        range.start.getTime() < room.availabilityStart.getTime()
      ) {
        return fail(
          'validation',
          `Room is not available before ${formatUtc(room.availabilityStart)}`,
        );
      }

      if (
        room.availabilityEnd &&
        range.end.getTime() > room.availabilityEnd.getTime()
      ) {
        return fail(
          'validation',
          `Room is not available after ${formatUtc(room.availabilityEnd)}`,
        );
      }

      if (
        request.expectedAttendees !== undefined &&
        request.expectedAttendees > room.capacity
      ) {
        return fail(
          'validation',
          `Expected attendees (${request.expectedAttendees}) exceeds room capacity (${room.capacity})`,
        );
      }

      const conflict = await findOverlappingRental(
        manager,
        roomId,
        range,
        SLOT_HOLDING_STATUSES,
      );
      if (conflict) {
        return fail('conflict', 'Room is already booked for this time slot');
      }

      const rentals = manager.getRepository(RoomRental);
      const rental = await rentals.save(
        rentals.create({
          roomId,
          renterId,
          startTime: range.start,
          endTime: range.end,
          status: RentalStatus.PENDING,
          purpose: request.purpose ?? null,
          expectedAttendees: request.expectedAttendees ?? null,
          totalCost:
            room.hourlyRate === null
              ? null
              : Math.round(room.hourlyRate * durationInHours(range) * 100) /
                100,
          adminNotes: null,
        }),
      );

      return ok(
        rental,
        'Rental request submitted successfully. Pending approval.',
      );
    });

    if (result.success) {
      this.logger.log(
        `Rental requested: rentalId=${result.data.id} room=${roomId} renter=${renterId}`,
      );
    }
    return result;
  }

  // ─── Owner / admin decisions ───────────────────────────────────────────────

  async approveRental(
    rentalId: string,
    approverId: string,
    isAdmin: boolean,
  ): Promise<Result<RoomRental>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const rentals = manager.getRepository(RoomRental);
      const rental = await rentals.findOne({ where: { id: rentalId } });
      if (!rental) return fail('not_found', 'Rental request not found');

      const room = await manager.findOne(Room, {
        where: { id: rental.roomId },
      });
      if (!room) return fail('not_found', 'Room not found');

      if (!isAdmin && room.organizerId !== approverId) {
        return fail(
          'forbidden',
          'Only the room organizer or admin can approve this rental',
        );
      }

      const transition = rentalStateMachine.check(
        rental.status,
        RentalStatus.APPROVED,
      );
      if (!transition.success) return transition;

      if (room.status !== RoomStatus.ENABLED) {
        return fail('validation', 'Room has been disabled by administrator');
      }

      // Only approved rentals block here: a competing pending request is
      // resolved by whichever of the two is approved first.
      const conflict = await findOverlappingRental(
        manager,
        rental.roomId,
        { start: rental.startTime, end: rental.endTime },
        [RentalStatus.APPROVED],
        rental.id,
      );
      if (conflict) {
        return fail(
          'conflict',
          'Cannot approve: conflicting rental was already approved',
        );
      }

      rental.status = RentalStatus.APPROVED;
      const saved = await rentals.save(rental);

      await this.auditService.log(
        {
          action: AuditAction.RENTAL_APPROVED,
          userId: approverId,
          resourceId: saved.id,
          meta: { roomId: saved.roomId, asAdmin: isAdmin },
        },
        manager,
      );

      return ok(saved, 'Rental approved successfully');
    });

    if (result.success) {
      this.logger.log(`Rental approved: rentalId=${rentalId} by=${approverId}`);
      await runAfterCommit(
        this.logger,
        `approval notice for rental ${rentalId}`,
        () => this.notificationsService.notifyBookingApproved(rentalId),
      );
    }
    return result;
  }

  async rejectRental(
    rentalId: string,
    rejecterId: string,
    isAdmin: boolean,
    reason?: string,
  ): Promise<Result<RoomRental>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const rentals = manager.getRepository(RoomRental);
      const rental = await rentals.findOne({ where: { id: rentalId } });
      if (!rental) return fail('not_found', 'Rental request not found');

      const room = await manager.findOne(Room, {
        where: { id: rental.roomId },
      });
      if (!room) return fail('not_found', 'Room not found');

      if (!isAdmin && room.organizerId !== rejecterId) {
        return fail(
          'forbidden',
          'Only the room organizer or admin can reject this rental',
        );
      }

      const transition = rentalStateMachine.check(
        rental.status,
        RentalStatus.REJECTED,
      );
      if (!transition.success) return transition;

      rental.status = RentalStatus.REJECTED;
      rental.adminNotes = reason ?? null;
      const saved = await rentals.save(rental);

      await this.auditService.log(
        {
          action: AuditAction.RENTAL_REJECTED,
          userId: rejecterId,
          resourceId: saved.id,
          meta: { roomId: saved.roomId, reason: reason ?? null },
        },
        manager,
      );

      return ok(saved, 'Rental rejected');
    });

    if (result.success) {
      this.logger.log(`Rental rejected: rentalId=${rentalId} by=${rejecterId}`);
      await runAfterCommit(
        this.logger,
        `rejection notice for rental ${rentalId}`,
        () => this.notificationsService.notifyBookingRejected(rentalId, reason),
      );
    }
    return result;
  }

  async cancelRental(
    rentalId: string,
    userId: string,
  ): Promise<Result<RoomRental>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const rentals = manager.getRepository(RoomRental);
      const rental = await rentals.findOne({ where: { id: rentalId } });
      if (!rental) return fail('not_found', 'Rental not found');

      if (rental.renterId !== userId) {
        return fail('forbidden', 'Only the renter can cancel this rental');
      }

      if (
        !rentalStateMachine.canTransition(rental.status, RentalStatus.CANCELLED)
      ) {
        return fail('validation', 'Cannot cancel rental with current status');
      }

      rental.status = RentalStatus.CANCELLED;
      const saved = await rentals.save(rental);

      await this.auditService.log(
        {
          action: AuditAction.RENTAL_CANCELLED,
          userId,
          resourceId: saved.id,
          meta: { roomId: saved.roomId },
        },
        manager,
      );

      return ok(saved, 'Rental cancelled successfully');
    });

    if (result.success) {
      this.logger.log(`Rental cancelled by renter: rentalId=${rentalId}`);
    }
    return result;
  }

  async adminCancelRental(
    rentalId: string,
    adminId: string,
    reason?: string,
  ): Promise<Result<RoomRental>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const rentals = manager.getRepository(RoomRental);
      const rental = await rentals.findOne({ where: { id: rentalId } });
      if (!rental) return fail('not_found', 'Rental not found');

      if (
        !rentalStateMachine.canTransition(rental.status, RentalStatus.CANCELLED)
      ) {
        return fail('validation', 'Cannot cancel rental with current status');
      }

      rental.status = RentalStatus.CANCELLED;
      if (reason && reason.trim()) {
        rental.adminNotes = `Cancelled by admin: ${reason}`;
      }
      const saved = await rentals.save(rental);

      await this.auditService.log(
        {
          action: AuditAction.RENTAL_ADMIN_CANCELLED,
          userId: adminId,
          resourceId: saved.id,
          meta: { roomId: saved.roomId, reason: reason ?? null },
        },
        manager,
      );

      return ok(saved, 'Rental cancelled successfully by administrator');
    });

    if (result.success) {
      this.logger.log(
        `Rental cancelled by admin: rentalId=${rentalId} admin=${adminId}`,
      );
    }
    return result;
  }

  async completeRental(
    rentalId: string,
    userId: string,
    isAdmin: boolean,
  ): Promise<Result<RoomRental>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const rentals = manager.getRepository(RoomRental);
      const rental = await rentals.findOne({ where: { id: rentalId } });
      if (!rental) return fail('not_found', 'Rental not found');

      const room = await manager.findOne(Room, {
        where: { id: rental.roomId },
      });
      if (!room) return fail('not_found', 'Room not found');

      if (!isAdmin && room.organizerId !== userId) {
        return fail(
          'forbidden',
          'Only the room organizer or admin can complete this rental',
        );
      }

      const transition = rentalStateMachine.check(
        rental.status,
        RentalStatus.COMPLETED,
      );
      if (!transition.success) return transition;

      if (rental.endTime.getTime() > Date.now()) {
        return fail('validation', 'Rental has not ended yet');
      }

      rental.status = RentalStatus.COMPLETED;
      const saved = await rentals.save(rental);

      await this.auditService.log(
        {
          action: AuditAction.RENTAL_COMPLETED,
          userId,
          resourceId: saved.id,
          meta: { roomId: saved.roomId },
        },
        manager,
      );

      return ok(saved, 'Rental marked as completed');
    });

    if (result.success) {
      this.logger.log(`Rental completed: rentalId=${rentalId}`);
    }
    return result;
  }

  // ─── Listings ──────────────────────────────────────────────────────────────

  getUserRentals(userId: string): Promise<RoomRental[]> {
    return this.rentalRepo.find({
      where: { renterId: userId },
      relations: { room: true },
      order: { createdAt: 'DESC' },
    });
  }

  getPendingRentalsForOrganizer(organizerId: string): Promise<RoomRental[]> {
    return this.rentalRepo.find({
      where: { status: RentalStatus.PENDING, room: { organizerId } },
      relations: { room: true },
      order: { startTime: 'ASC' },
    });
  }

  getAllRentals(status?: RentalStatus): Promise<RoomRental[]> {
    return this.rentalRepo.find({
      where: status ? { status } : {},
      relations: { room: true },
      order: { createdAt: 'DESC' },
    });
  }
}
