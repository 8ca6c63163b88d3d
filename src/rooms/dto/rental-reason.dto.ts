import { IsOptional, IsString, MaxLength } from 'class-validator';

/** Free-text reason recorded with a rejection or admin cancellation. */
export class RentalReasonDto {
  @IsString()
  @IsOptional()
  @MaxLength(1000)
  reason?: string;
}
