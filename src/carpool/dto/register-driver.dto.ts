import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import {
  DriverType,
  MAX_DRIVER_CAPACITY,
  MIN_DRIVER_CAPACITY,
  VehicleType,
} from '../entities/driver.entity';

export class RegisterDriverDto {
  @IsInt()
  @Min(MIN_DRIVER_CAPACITY)
  @Max(MAX_DRIVER_CAPACITY)
  capacity!: number;

  @IsEnum(VehicleType)
  vehicleType!: VehicleType;

  @IsEnum(DriverType)
  driverType!: DriverType;

  @IsString()
  @IsOptional()
  @MaxLength(32)
  licensePlate?: string;

  @IsString()
  @IsOptional()
  @MaxLength(512)
  accessibilityFeatures?: string;
}
