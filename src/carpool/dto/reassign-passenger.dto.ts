import { IsUUID } from 'class-validator';

export class ReassignPassengerDto {
  @IsUUID()
  newOfferId!: string;
}
