import { Module } from '@nestjs/common';
import { AdminController } from './admin.controller';
import { RoomsModule } from '../rooms/rooms.module';
import { CarpoolModule } from '../carpool/carpool.module';

@Module({
  imports: [RoomsModule, CarpoolModule],
  controllers: [AdminController],
})
export class AdminModule {}
