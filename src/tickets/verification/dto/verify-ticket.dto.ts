import { IsString, IsNotEmpty, MaxLength } from 'class-validator';

export class VerifyTicketDto {
  /** The raw string decoded from the ticket's QR code. */
  @IsString()
  @IsNotEmpty()
  @MaxLength(4096)
  token!: string;
}
