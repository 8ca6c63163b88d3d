import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TicketEntity } from './entities/ticket.entity';
import { TicketsService } from './tickets.service';
import { TicketTokenService } from './ticket-token.service';
import { TicketsController } from './tickets.controller';
import { VerificationController } from './verification/verification.controller';
import { EventsModule } from '../events/events.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forFeature([TicketEntity]),
    EventsModule,
    AuditModule,
  ],
  providers: [TicketsService, TicketTokenService],
  controllers: [TicketsController, VerificationController],
  exports: [TicketsService, TicketTokenService],
})
export class TicketsModule {}
