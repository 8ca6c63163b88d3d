import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThan, Repository } from 'typeorm';
import {
  Notification,
  NotificationType,
} from './entities/notification.entity';
import {
  RentalStatus,
  RoomRental,
} from '../rooms/entities/room-rental.entity';
import { Room } from '../rooms/entities/room.entity';
import { formatUtc } from '../rooms/utils/time-range';
import { fail, ok, Result } from '../common/result';

interface NotificationDraft {
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  relatedEntityId: string;
}

/**
 * In-app notifications for rental outcomes. Callers invoke these only after
 * the corresponding transition has committed.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    @InjectRepository(Notification)
    private readonly notificationRepo: Repository<Notification>,
    @InjectRepository(RoomRental)
    private readonly rentalRepo: Repository<RoomRental>,
    @InjectRepository(Room)
    private readonly roomRepo: Repository<Room>,
  ) {}

  async notifyBookingApproved(rentalId: string): Promise<void> {
    const rental = await this.findRentalWithRoom(rentalId);
    if (!rental) return;

    await this.create({
      userId: rental.renterId,
      type: NotificationType.BOOKING_APPROVED,
      title: 'Booking approved',
      message: `Your booking for ${rental.room.name} on ${formatUtc(rental.startTime)} has been approved.`,
      relatedEntityId: rental.id,
    });
  }

  async notifyBookingRejected(rentalId: string, reason?: string): Promise<void> {
    const rental = await this.findRentalWithRoom(rentalId);
    if (!rental) return;

    const suffix = reason ? ` Reason: ${reason}` : '';
    await this.create({
      userId: rental.renterId,
      type: NotificationType.BOOKING_REJECTED,
      title: 'Booking rejected',
      message: `Your booking for ${rental.room.name} on ${formatUtc(rental.startTime)} was rejected.${suffix}`,
      relatedEntityId: rental.id,
    });
  }

  /** Warns renters holding approved rentals that have not ended yet. */
  async notifyResourceDisabled(roomId: string): Promise<void> {
    const room = await this.roomRepo.findOne({ where: { id: roomId } });
    if (!room) return;

    const affected = await this.rentalRepo.find({
      where: {
        roomId,
        status: RentalStatus.APPROVED,
        endTime: MoreThan(new Date()),
      },
    });

    for (const rental of affected) {
      await this.create({
        userId: rental.renterId,
        type: NotificationType.RESOURCE_DISABLED,
        title: 'Room unavailable',
        message: `${room.name} is no longer available. Your booking on ${formatUtc(rental.startTime)} may be affected.`,
        relatedEntityId: rental.id,
      });
    }
  }

  getNotifications(userId: string, unreadOnly = false): Promise<Notification[]> {
    return this.notificationRepo.find({
      where: unreadOnly ? { userId, isRead: false } : { userId },
      order: { createdAt: 'DESC' },
    });
  }

  async markAsRead(id: string, userId: string): Promise<Result<Notification>> {
    const notification = await this.notificationRepo.findOne({
      where: { id, userId },
    });
    if (!notification) return fail('not_found', 'Notification not found');

    notification.isRead = true;
    return ok(
      await this.notificationRepo.save(notification),
      'Notification marked as read',
    );
  }

  private findRentalWithRoom(rentalId: string): Promise<RoomRental | null> {
    return this.rentalRepo.findOne({
      where: { id: rentalId },
      relations: { room: true },
    });
  }

  private async create(draft: NotificationDraft): Promise<void> {
    await this.notificationRepo.save(this.notificationRepo.create(draft));
    this.logger.log(
      `Notification ${draft.type} queued for user=${draft.userId} (${draft.relatedEntityId})`,
    );
  }
}
