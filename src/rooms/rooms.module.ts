import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Room } from './entities/room.entity';
import { RoomRental } from './entities/room-rental.entity';
import { RoomsService } from './rooms.service';
import { RentalsService } from './rentals.service';
import { RoomsController } from './rooms.controller';
import { RentalsController } from './rentals.controller';
import { UsersModule } from '../users/users.module';
import { AuditModule } from '../audit/audit.module';
import { NotificationsModule } from '../notifications/notifications.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Room, RoomRental]),
    UsersModule,
    AuditModule,
    NotificationsModule,
  ],
  controllers: [RoomsController, RentalsController],
  providers: [RoomsService, RentalsService],
  exports: [RoomsService, RentalsService],
})
export class RoomsModule {}
