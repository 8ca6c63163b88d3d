import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Driver } from './entities/driver.entity';
import { DriverFlag } from './entities/driver-flag.entity';
import { CarpoolOffer } from './entities/carpool-offer.entity';
import { CarpoolPassenger } from './entities/carpool-passenger.entity';
import { DriversService } from './drivers.service';
import { CarpoolService } from './carpool.service';
import { DriversController } from './drivers.controller';
import { CarpoolController } from './carpool.controller';
import { UsersModule } from '../users/users.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Driver,
      DriverFlag,
      CarpoolOffer,
      CarpoolPassenger,
    ]),
    UsersModule,
    AuditModule,
  ],
  controllers: [DriversController, CarpoolController],
  providers: [DriversService, CarpoolService],
  exports: [DriversService, CarpoolService],
})
export class CarpoolModule {}
