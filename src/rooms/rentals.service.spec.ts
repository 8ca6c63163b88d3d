import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { RentalsService } from './rentals.service';
import { Room, RoomStatus } from './entities/room.entity';
import { RentalStatus, RoomRental } from './entities/room-rental.entity';
import { AuditService } from '../audit/audit.service';
import { AuditAction, AuditLog } from '../audit/entities/audit-log.entity';
import { NotificationsService } from '../notifications/notifications.service';
import { UserRole } from '../users/enums/user-role.enum';
import {
  future,
  inMemoryDatabase,
  seedRental,
  seedRoom,
  seedUser,
} from '../../test/utils/in-memory-database';

describe('RentalsService', () => {
  let moduleRef: TestingModule;
  let service: RentalsService;
  let dataSource: DataSource;
  let room: Room;
  let organizerId: string;

  const notifications = {
    notifyBookingApproved: jest.fn(),
    notifyBookingRejected: jest.fn(),
    notifyResourceDisabled: jest.fn(),
  };

  const slot = (start: string, end: string) => ({
    startTime: future(`03-01T${start}:00`),
    endTime: future(`03-01T${end}:00`),
  });

  const statusOf = async (id: string) =>
    (await dataSource.getRepository(RoomRental).findOneByOrFail({ id })).status;

  beforeEach(async () => {
    jest.clearAllMocks();
    notifications.notifyBookingApproved.mockResolvedValue(undefined);
    notifications.notifyBookingRejected.mockResolvedValue(undefined);

    moduleRef = await Test.createTestingModule({
      imports: [
        inMemoryDatabase(),
        TypeOrmModule.forFeature([Room, RoomRental, AuditLog]),
      ],
      providers: [
        RentalsService,
        AuditService,
        { provide: NotificationsService, useValue: notifications },
      ],
    }).compile();

    service = moduleRef.get(RentalsService);
    dataSource = moduleRef.get(DataSource);

    const organizer = await seedUser(dataSource, UserRole.ORGANIZER);
    organizerId = organizer.id;
    room = await seedRoom(dataSource, organizerId);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  // ── requestRental ─────────────────────────────────────────────────────────

  describe('requestRental', () => {
    it('creates a pending rental priced by the hour', async () => {
      await dataSource.getRepository(Room).update(room.id, { hourlyRate: 20 });

      const result = await service.requestRental(room.id, 'student-1', {
        ...slot('10:00', '11:30'),
        purpose: 'Study group',
        expectedAttendees: 12,
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.message).toBe(
        'Rental request submitted successfully. Pending approval.',
      );
      expect(result.data.status).toBe(RentalStatus.PENDING);
      expect(result.data.totalCost).toBe(30);
      expect(result.data.renterId).toBe('student-1');
    });

    it('leaves the cost empty for rooms without a rate', async () => {
      const result = await service.requestRental(
        room.id,
        'student-1',
        slot('10:00', '11:00'),
      );

      expect(result.success && result.data.totalCost).toBeNull();
    });

    it('reports unknown rooms', async () => {
      await expect(
        service.requestRental(
          '00000000-0000-4000-8000-000000000000',
          'student-1',
          slot('10:00', '11:00'),
        ),
      ).resolves.toEqual({
        success: false,
        kind: 'not_found',
        message: 'Room not found',
      });
    });

    it('refuses disabled rooms', async () => {
      await dataSource
        .getRepository(Room)
        .update(room.id, { status: RoomStatus.UNDER_MAINTENANCE });

      const result = await service.requestRental(
        room.id,
        'student-1',
        slot('10:00', '11:00'),
      );

      expect(result).toEqual({
        success: false,
        kind: 'validation',
        message: 'Room is currently disabled',
      });
    });

    it('refuses empty or inverted ranges', async () => {
      const result = await service.requestRental(
        room.id,
        'student-1',
        slot('11:00', '11:00'),
      );

      expect(result).toEqual({
        success: false,
        kind: 'validation',
        message: 'End time must be after start time',
      });
    });

    it('refuses ranges that start in the past', async () => {
      const start = new Date(Date.now() - 60 * 60 * 1000);
      const result = await service.requestRental(room.id, 'student-1', {
        startTime: start,
        endTime: new Date(start.getTime() + 2 * 60 * 60 * 1000),
      });

      expect(result).toEqual({
        success: false,
        kind: 'validation',
        message: 'Cannot book time in the past',
      });
    });

    it('keeps bookings inside the availability window', async () => {
      await dataSource.getRepository(Room).update(room.id, {
        availabilityStart: future('03-01T08:00:00'),
        availabilityEnd: future('03-01T18:00:00'),
      });

      await expect(
        service.requestRental(room.id, 'student-1', slot('07:00', '09:00')),
      ).resolves.toEqual({
        success: false,
        kind: 'validation',
        message: 'Room is not available before 2099-03-01 08:00 UTC',
      });
      await expect(
        service.requestRental(room.id, 'student-1', slot('17:00', '19:00')),
      ).resolves.toEqual({
        success: false,
        kind: 'validation',
        message: 'Room is not available after 2099-03-01 18:00 UTC',
      });
    });

    it('refuses groups larger than the room', async () => {
      const result = await service.requestRental(room.id, 'student-1', {
        ...slot('10:00', '11:00'),
        expectedAttendees: 31,
      });

      expect(result).toEqual({
        success: false,
        kind: 'validation',
        message: 'Expected attendees (31) exceeds room capacity (30)',
      });
    });

    it.each([
      ['overlaps the end', '11:00', '13:00'],
      ['overlaps the start', '09:00', '11:00'],
      ['sits inside', '10:30', '11:30'],
      ['encloses', '09:00', '13:00'],
    ])('rejects a second request that %s a held slot', async (_l, start, end) => {
      const first = await service.requestRental(
        room.id,
        'student-1',
        slot('10:00', '12:00'),
      );
      expect(first.success).toBe(true);

      await expect(
        service.requestRental(room.id, 'student-2', slot(start, end)),
      ).resolves.toEqual({
        success: false,
        kind: 'conflict',
        message: 'Room is already booked for this time slot',
      });
    });

    it('accepts back-to-back bookings', async () => {
      await service.requestRental(room.id, 'student-1', slot('10:00', '12:00'));

      const after = await service.requestRental(
        room.id,
        'student-2',
        slot('12:00', '13:00'),
      );

      expect(after.success).toBe(true);
    });

    it('frees the slot once the holding rental is cancelled', async () => {
      const first = await service.requestRental(
        room.id,
        'student-1',
        slot('10:00', '12:00'),
      );
      if (!first.success) throw new Error(first.message);
      await service.cancelRental(first.data.id, 'student-1');

      const second = await service.requestRental(
        room.id,
        'student-2',
        slot('10:00', '12:00'),
      );

      expect(second.success).toBe(true);
    });
  });

  // ── approveRental ─────────────────────────────────────────────────────────

  describe('approveRental', () => {
    it('approves for the room owner, audits and notifies once', async () => {
      const rental = await seedRental(dataSource, room.id);

      const result = await service.approveRental(rental.id, organizerId, false);

      expect(result.success).toBe(true);
      expect(await statusOf(rental.id)).toBe(RentalStatus.APPROVED);
      expect(notifications.notifyBookingApproved).toHaveBeenCalledTimes(1);
      expect(notifications.notifyBookingApproved).toHaveBeenCalledWith(
        rental.id,
      );

      const audit = await dataSource
        .getRepository(AuditLog)
        .findBy({ resourceId: rental.id });
      expect(audit.map((entry) => entry.action)).toEqual([
        AuditAction.RENTAL_APPROVED,
      ]);
    });

    it('refuses organizers who do not own the room', async () => {
      const rental = await seedRental(dataSource, room.id);

      await expect(
        service.approveRental(rental.id, 'someone-else', false),
      ).resolves.toEqual({
        success: false,
        kind: 'forbidden',
        message: 'Only the room organizer or admin can approve this rental',
      });
      expect(notifications.notifyBookingApproved).not.toHaveBeenCalled();
    });

    it('lets an admin approve any room', async () => {
      const rental = await seedRental(dataSource, room.id);

      const result = await service.approveRental(rental.id, 'admin-1', true);

      expect(result.success).toBe(true);
    });

    it('only approves pending rentals', async () => {
      const rental = await seedRental(dataSource, room.id);
      await service.approveRental(rental.id, organizerId, false);

      const again = await service.approveRental(rental.id, organizerId, false);

      expect(again).toEqual({
        success: false,
        kind: 'validation',
        message:
          'Invalid rental status transition: "approved" → "approved". Allowed transitions from "approved": cancelled, completed.',
      });
      expect(notifications.notifyBookingApproved).toHaveBeenCalledTimes(1);
    });

    it('refuses when the room was disabled while the request waited', async () => {
      const rental = await seedRental(dataSource, room.id);
      await dataSource
        .getRepository(Room)
        .update(room.id, { status: RoomStatus.DISABLED });

      await expect(
        service.approveRental(rental.id, organizerId, false),
      ).resolves.toEqual({
        success: false,
        kind: 'validation',
        message: 'Room has been disabled by administrator',
      });
      expect(await statusOf(rental.id)).toBe(RentalStatus.PENDING);
    });

    it('re-checks overlaps against approved rentals at approval time', async () => {
      const first = await seedRental(dataSource, room.id, slot('10:00', '12:00'));
      const second = await seedRental(dataSource, room.id, {
        ...slot('11:00', '13:00'),
        renterId: 'student-2',
      });

      const approved = await service.approveRental(first.id, organizerId, false);
      const blocked = await service.approveRental(second.id, organizerId, false);

      expect(approved.success).toBe(true);
      expect(blocked).toEqual({
        success: false,
        kind: 'conflict',
        message: 'Cannot approve: conflicting rental was already approved',
      });
      expect(await statusOf(second.id)).toBe(RentalStatus.PENDING);
    });

    it('blocks the earlier request once the later one is approved', async () => {
      const first = await seedRental(dataSource, room.id, slot('10:00', '12:00'));
      const second = await seedRental(dataSource, room.id, {
        ...slot('11:00', '13:00'),
        renterId: 'student-2',
      });

      const approved = await service.approveRental(second.id, organizerId, false);
      const blocked = await service.approveRental(first.id, organizerId, false);

      expect(approved.success).toBe(true);
      expect(blocked).toEqual({
        success: false,
        kind: 'conflict',
        message: 'Cannot approve: conflicting rental was already approved',
      });
      expect(await statusOf(first.id)).toBe(RentalStatus.PENDING);
    });

    it('keeps the approval when the notification fails', async () => {
      notifications.notifyBookingApproved.mockRejectedValueOnce(
        new Error('mailer offline'),
      );
      const rental = await seedRental(dataSource, room.id);

      const result = await service.approveRental(rental.id, organizerId, false);

      expect(result.success).toBe(true);
      expect(await statusOf(rental.id)).toBe(RentalStatus.APPROVED);
    });
  });

  // ── rejectRental ──────────────────────────────────────────────────────────

  describe('rejectRental', () => {
    it('rejects with a reason and notifies the renter', async () => {
      const rental = await seedRental(dataSource, room.id);

      const result = await service.rejectRental(
        rental.id,
        organizerId,
        false,
        'Exam week',
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(RentalStatus.REJECTED);
      expect(result.data.adminNotes).toBe('Exam week');
      expect(notifications.notifyBookingRejected).toHaveBeenCalledWith(
        rental.id,
        'Exam week',
      );
    });

    it('cannot reject an approved rental', async () => {
      const rental = await seedRental(dataSource, room.id, {
        status: RentalStatus.APPROVED,
      });

      const result = await service.rejectRental(rental.id, organizerId, false);

      expect(result.success).toBe(false);
      expect(notifications.notifyBookingRejected).not.toHaveBeenCalled();
    });
  });

  // ── cancellations ─────────────────────────────────────────────────────────

  describe('cancelRental', () => {
    it('only lets the renter cancel', async () => {
      const rental = await seedRental(dataSource, room.id);

      await expect(service.cancelRental(rental.id, 'student-2')).resolves.toEqual({
        success: false,
        kind: 'forbidden',
        message: 'Only the renter can cancel this rental',
      });
    });

    it('cancels pending and approved rentals but nothing else', async () => {
      const pending = await seedRental(dataSource, room.id);
      const rejected = await seedRental(dataSource, room.id, {
        ...slot('14:00', '15:00'),
        status: RentalStatus.REJECTED,
      });

      const ok = await service.cancelRental(pending.id, 'student-1');
      const refused = await service.cancelRental(rejected.id, 'student-1');

      expect(ok.success).toBe(true);
      expect(await statusOf(pending.id)).toBe(RentalStatus.CANCELLED);
      expect(refused).toEqual({
        success: false,
        kind: 'validation',
        message: 'Cannot cancel rental with current status',
      });
    });
  });

  describe('adminCancelRental', () => {
    it('records the reason in the admin notes', async () => {
      const rental = await seedRental(dataSource, room.id, {
        status: RentalStatus.APPROVED,
      });

      const result = await service.adminCancelRental(
        rental.id,
        'admin-1',
        'Double-booked by facilities',
      );

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.status).toBe(RentalStatus.CANCELLED);
      expect(result.data.adminNotes).toBe(
        'Cancelled by admin: Double-booked by facilities',
      );
    });

    it('leaves the notes alone when no reason is given', async () => {
      const rental = await seedRental(dataSource, room.id);

      const result = await service.adminCancelRental(rental.id, 'admin-1');

      expect(result.success && result.data.adminNotes).toBeNull();
    });
  });

  // ── completeRental ────────────────────────────────────────────────────────

  describe('completeRental', () => {
    it('completes approved rentals that have ended', async () => {
      const rental = await seedRental(dataSource, room.id, {
        startTime: new Date('2020-01-01T10:00:00Z'),
        endTime: new Date('2020-01-01T12:00:00Z'),
        status: RentalStatus.APPROVED,
      });

      const result = await service.completeRental(rental.id, organizerId, false);

      expect(result.success).toBe(true);
      expect(await statusOf(rental.id)).toBe(RentalStatus.COMPLETED);
    });

    it('waits for the rental to end', async () => {
      const rental = await seedRental(dataSource, room.id, {
        status: RentalStatus.APPROVED,
      });

      await expect(
        service.completeRental(rental.id, organizerId, false),
      ).resolves.toEqual({
        success: false,
        kind: 'validation',
        message: 'Rental has not ended yet',
      });
    });
  });

  // ── listings ──────────────────────────────────────────────────────────────

  it('lists pending requests for the organizer’s rooms only', async () => {
    const otherRoom = await seedRoom(dataSource, 'organizer-2', {
      name: 'Room 202',
    });
    const mine = await seedRental(dataSource, room.id);
    await seedRental(dataSource, otherRoom.id);
    await seedRental(dataSource, room.id, {
      ...slot('14:00', '15:00'),
      status: RentalStatus.APPROVED,
    });

    const pending = await service.getPendingRentalsForOrganizer(organizerId);

    expect(pending.map((rental) => rental.id)).toEqual([mine.id]);
  });
});
