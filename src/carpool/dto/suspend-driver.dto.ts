import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class SuspendDriverDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  reason!: string;
}
