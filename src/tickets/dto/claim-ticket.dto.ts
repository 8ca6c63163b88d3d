import { IsUUID } from 'class-validator';

export class ClaimTicketDto {
  @IsUUID()
  eventId!: string;
}
