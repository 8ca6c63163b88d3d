import { IsEnum, IsOptional, IsUUID } from 'class-validator';
import { DriverStatus } from '../entities/driver.entity';

export class DriverStatusFilterDto {
  @IsOptional()
  @IsEnum(DriverStatus)
  status?: DriverStatus;
}

export class PassengerFilterDto {
  @IsOptional()
  @IsUUID()
  eventId?: string;
}
