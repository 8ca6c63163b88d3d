import { IsOptional, IsString, MaxLength } from 'class-validator';

export class JoinOfferDto {
  @IsString()
  @IsOptional()
  @MaxLength(255)
  pickupLocation?: string;

  @IsString()
  @IsOptional()
  @MaxLength(1000)
  notes?: string;
}
