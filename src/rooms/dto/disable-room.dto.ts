import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { RoomStatus } from '../entities/room.entity';

export type DisabledRoomStatus =
  | RoomStatus.DISABLED
  | RoomStatus.UNDER_MAINTENANCE;

export class DisableRoomDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  reason!: string;

  @IsIn([RoomStatus.DISABLED, RoomStatus.UNDER_MAINTENANCE])
  @IsOptional()
  status?: DisabledRoomStatus;
}
