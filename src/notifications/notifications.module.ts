import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Notification } from './entities/notification.entity';
import { NotificationsController } from './notifications.controller';
import { NotificationsService } from './notifications.service';
import { Room } from '../rooms/entities/room.entity';
import { RoomRental } from '../rooms/entities/room-rental.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Notification, Room, RoomRental])],
  controllers: [NotificationsController],
  providers: [NotificationsService],
  exports: [NotificationsService],
})
export class NotificationsModule {}
