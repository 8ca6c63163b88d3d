import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, MoreThanOrEqual, Repository } from 'typeorm';

import { Room, RoomStatus } from './entities/room.entity';
import {
  RentalStatus,
  RoomRental,
  SLOT_HOLDING_STATUSES,
} from './entities/room-rental.entity';
import { CreateRoomDto } from './dto/create-room.dto';
import { UpdateRoomDto } from './dto/update-room.dto';
import { DisabledRoomStatus } from './dto/disable-room.dto';
import { isWithinWindow, TimeRange } from './utils/time-range';
import { findOverlappingRental } from './utils/rental-conflicts';
import { UsersService } from '../users/users.service';
import { UserRole } from '../users/enums/user-role.enum';
import { AuditService } from '../audit/audit.service';
import { AuditAction } from '../audit/entities/audit-log.entity';
import { NotificationsService } from '../notifications/notifications.service';
import { runSerializable } from '../common/database/transaction';
import { runAfterCommit } from '../common/utils/after-commit';
import { fail, ok, Result } from '../common/result';

export interface DisabledRoom {
  room: Room;
  rejectedRentalIds: string[];
}

function windowError(start: Date | null, end: Date | null): string | null {
  if (start && end && end.getTime() <= start.getTime()) {
    return 'Availability end time must be after start time';
  }
  return null;
}

@Injectable()
export class RoomsService {
  private readonly logger = new Logger(RoomsService.name);

  constructor(
    @InjectRepository(Room)
    private readonly roomRepo: Repository<Room>,
    @InjectRepository(RoomRental)
    private readonly rentalRepo: Repository<RoomRental>,
    private readonly usersService: UsersService,
    private readonly auditService: AuditService,
    private readonly notificationsService: NotificationsService,
    private readonly dataSource: DataSource,
  ) {}

  // ─── Room management (organizers) ──────────────────────────────────────────

  async createRoom(
    organizerId: string,
    dto: CreateRoomDto,
  ): Promise<Result<Room>> {
    const user = await this.usersService.findById(organizerId);
    if (!user) return fail('not_found', 'User not found');

    if (user.role !== UserRole.ORGANIZER) {
      return fail('forbidden', 'Only organizers can create rooms');
    }

    if (dto.capacity < 1) {
      return fail('validation', 'Capacity must be at least 1');
    }

    const availabilityStart = dto.availabilityStart
      ? new Date(dto.availabilityStart)
      : null;
    const availabilityEnd = dto.availabilityEnd
      ? new Date(dto.availabilityEnd)
      : null;

    const invalidWindow = windowError(availabilityStart, availabilityEnd);
    if (invalidWindow) return fail('validation', invalidWindow);

    const room = await this.roomRepo.save(
      this.roomRepo.create({
        organizerId,
        name: dto.name,
        address: dto.address,
        capacity: dto.capacity,
        roomInfo: dto.roomInfo ?? null,
        amenities: dto.amenities ?? '',
        hourlyRate: dto.hourlyRate ?? null,
        status: RoomStatus.ENABLED,
        availabilityStart,
        availabilityEnd,
      }),
    );

    this.logger.log(`Room created: roomId=${room.id} organizer=${organizerId}`);
    return ok(room, 'Room created successfully');
  }

  async updateRoom(
    roomId: string,
    userId: string,
    dto: UpdateRoomDto,
  ): Promise<Result<Room>> {
    const room = await this.roomRepo.findOne({ where: { id: roomId } });
    if (!room) return fail('not_found', 'Room not found');

    if (room.organizerId !== userId) {
      return fail('forbidden', 'Only the room organizer can update this room');
    }

    if (dto.capacity !== undefined && dto.capacity < 1) {
      return fail('validation', 'Capacity must be at least 1');
    }

    if (dto.name !== undefined) room.name = dto.name;
    if (dto.address !== undefined) room.address = dto.address;
    if (dto.capacity !== undefined) room.capacity = dto.capacity;
    if (dto.roomInfo !== undefined) room.roomInfo = dto.roomInfo;
    if (dto.amenities !== undefined) room.amenities = dto.amenities;
    if (dto.hourlyRate !== undefined) room.hourlyRate = dto.hourlyRate;
    if (dto.availabilityStart !== undefined) {
      room.availabilityStart = new Date(dto.availabilityStart);
    }
    if (dto.availabilityEnd !== undefined) {
      room.availabilityEnd = new Date(dto.availabilityEnd);
    }

    const invalidWindow = windowError(
      room.availabilityStart,
      room.availabilityEnd,
    );
    if (invalidWindow) return fail('validation', invalidWindow);

    const saved = await this.roomRepo.save(room);
    this.logger.log(`Room updated: roomId=${roomId}`);
    return ok(saved, 'Room updated successfully');
  }

  // ─── Listings ──────────────────────────────────────────────────────────────

  /** Enabled rooms, alphabetically. */
  getRooms(minCapacity?: number): Promise<Room[]> {
    return this.roomRepo.find({
      where:
        minCapacity === undefined
          ? { status: RoomStatus.ENABLED }
          : {
              status: RoomStatus.ENABLED,
              capacity: MoreThanOrEqual(minCapacity),
            },
      order: { name: 'ASC' },
    });
  }

  getOrganizerRooms(organizerId: string): Promise<Room[]> {
    return this.roomRepo.find({
      where: { organizerId },
      relations: { rentals: true },
      order: { createdAt: 'DESC' },
    });
  }

  getAllRooms(status?: RoomStatus): Promise<Room[]> {
    return this.roomRepo.find({
      where: status ? { status } : {},
      order: { createdAt: 'DESC' },
    });
  }

  /**
   * Enabled rooms that could take a booking for `[start, end)`: large
   * enough, open for the whole range, and not held by a pending or
   * approved rental.
   */
  async getAvailableRooms(
    start: Date,
    end: Date,
    minCapacity?: number,
  ): Promise<Result<Room[]>> {
    if (end.getTime() <= start.getTime()) {
      return fail('validation', 'End time must be after start time');
    }

    const range: TimeRange = { start, end };
    const candidates = (await this.getRooms(minCapacity)).filter((room) =>
      isWithinWindow(range, room.availabilityStart, room.availabilityEnd),
    );

    const available: Room[] = [];
    for (const room of candidates) {
      const conflict = await findOverlappingRental(
        this.rentalRepo,
        room.id,
        range,
        SLOT_HOLDING_STATUSES,
      );
      if (!conflict) available.push(room);
    }

    return ok(available, `${available.length} room(s) available`);
  }

  // ─── Admin overrides ───────────────────────────────────────────────────────

  /**
   * Takes a room out of service and rejects its pending requests in the
   * same transaction. Approved rentals are left as they are; their renters
   * are warned once the change has committed.
   */
  async disableRoom(
    roomId: string,
    adminId: string,
    reason: string,
    status: DisabledRoomStatus = RoomStatus.DISABLED,
  ): Promise<Result<DisabledRoom>> {
    const adminNotes = `Room disabled by admin: ${reason}`;

    const result = await runSerializable(this.dataSource, async (manager) => {
      const room = await manager.findOne(Room, { where: { id: roomId } });
      if (!room) return fail('not_found', 'Room not found');

      room.status = status;
      const savedRoom = await manager.save(room);

      const rentals = manager.getRepository(RoomRental);
      const pending = await rentals.find({
        where: { roomId, status: RentalStatus.PENDING },
      });
      for (const rental of pending) {
        rental.status = RentalStatus.REJECTED;
        rental.adminNotes = adminNotes;
      }
      await rentals.save(pending);

      const rejectedRentalIds = pending.map((rental) => rental.id);

      await this.auditService.log(
        {
          action: AuditAction.ROOM_DISABLED,
          userId: adminId,
          resourceId: roomId,
          meta: { status, reason, rejectedRentalIds },
        },
        manager,
      );

      return ok(
        { room: savedRoom, rejectedRentalIds },
        'Room disabled successfully. All pending rentals have been rejected.',
      );
    });

    if (!result.success) return result;

    this.logger.log(
      `Room disabled: roomId=${roomId} status=${status} rejected=${result.data.rejectedRentalIds.length}`,
    );

    for (const rentalId of result.data.rejectedRentalIds) {
      await runAfterCommit(
        this.logger,
        `rejection notice for rental ${rentalId}`,
        () =>
          this.notificationsService.notifyBookingRejected(rentalId, adminNotes),
      );
    }
    await runAfterCommit(this.logger, `disable notice for room ${roomId}`, () =>
      this.notificationsService.notifyResourceDisabled(roomId),
    );

    return result;
  }

  async enableRoom(roomId: string, adminId: string): Promise<Result<Room>> {
    const result = await runSerializable(this.dataSource, async (manager) => {
      const room = await manager.findOne(Room, { where: { id: roomId } });
      if (!room) return fail('not_found', 'Room not found');

      room.status = RoomStatus.ENABLED;
      const saved = await manager.save(room);

      await this.auditService.log(
        {
          action: AuditAction.ROOM_ENABLED,
          userId: adminId,
          resourceId: roomId,
        },
        manager,
      );

      return ok(saved, 'Room enabled successfully');
    });

    if (result.success) {
      this.logger.log(`Room enabled: roomId=${roomId}`);
    }
    return result;
  }
}
