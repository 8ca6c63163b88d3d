import {
  IsDateString,
  IsInt,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
  Min,
} from 'class-validator';

export class RequestRentalDto {
  @IsUUID()
  roomId!: string;

  @IsDateString()
  startTime!: string;

  @IsDateString()
  endTime!: string;

  @IsString()
  @IsOptional()
  @MaxLength(1000)
  purpose?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  expectedAttendees?: number;
}
