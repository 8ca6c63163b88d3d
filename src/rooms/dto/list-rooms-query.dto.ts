import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, Min } from 'class-validator';
import { RoomStatus } from '../entities/room.entity';
import { RentalStatus } from '../entities/room-rental.entity';

export class ListRoomsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  minCapacity?: number;
}

export class RoomStatusFilterDto {
  @IsOptional()
  @IsEnum(RoomStatus)
  status?: RoomStatus;
}

export class RentalStatusFilterDto {
  @IsOptional()
  @IsEnum(RentalStatus)
  status?: RentalStatus;
}
