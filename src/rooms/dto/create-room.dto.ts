import {
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

export class CreateRoomDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  address!: string;

  @IsInt()
  @Min(1, { message: 'Capacity must be at least 1' })
  capacity!: number;

  @IsString()
  @IsOptional()
  roomInfo?: string;

  @IsString()
  @IsOptional()
  amenities?: string;

  @IsNumber()
  @Min(0)
  @IsOptional()
  hourlyRate?: number;

  @IsDateString()
  @IsOptional()
  availabilityStart?: string;

  @IsDateString()
  @IsOptional()
  availabilityEnd?: string;
}
