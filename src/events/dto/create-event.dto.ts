import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsDateString,
  IsInt,
  Min,
} from 'class-validator';

export class CreateEventDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsString()
  @IsOptional()
  location?: string;

  @IsDateString()
  startDate!: string;

  @IsDateString()
  endDate!: string;

  /**
   * Maximum number of tickets that can be claimed for this event.
   * Omit for unlimited capacity.
   */
  @IsOptional()
  @IsInt()
  @Min(1)
  maxAttendees?: number;
}
