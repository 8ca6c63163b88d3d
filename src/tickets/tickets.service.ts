import { randomBytes } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';

import { TicketEntity } from './entities/ticket.entity';
import { TicketTokenService } from './ticket-token.service';
import { Event } from '../events/entities/event.entity';
import { EventsService } from '../events/events.service';
import { AuditService } from '../audit/audit.service';
import { AuditAction } from '../audit/entities/audit-log.entity';
import { runSerializable } from '../common/database/transaction';
import { fail, ok, Result } from '../common/result';

export interface IssuedTicket {
  ticket: TicketEntity;
  token: string;
}

@Injectable()
export class TicketsService {
  private readonly logger = new Logger(TicketsService.name);

  constructor(
    @InjectRepository(TicketEntity)
    private readonly ticketRepo: Repository<TicketEntity>,
    private readonly eventsService: EventsService,
    private readonly ticketTokenService: TicketTokenService,
    private readonly auditService: AuditService,
    private readonly dataSource: DataSource,
  ) {}

  async claimTicket(
    eventId: string,
    userId: string,
  ): Promise<Result<IssuedTicket>> {
    const claimed = await runSerializable(this.dataSource, async (manager) => {
      const event = await manager.findOne(Event, { where: { id: eventId } });
      if (!event) return fail('not_found', 'Event not found');

      const tickets = manager.getRepository(TicketEntity);

      const existing = await tickets.findOne({
        where: { eventId, ownerId: userId },
      });
      if (existing) {
        return fail('conflict', 'You already have a ticket for this event');
      }

      if (event.maxAttendees !== null) {
        const issued = await tickets.count({ where: { eventId } });
        if (issued >= event.maxAttendees) {
          return fail('conflict', 'Event is sold out');
        }
      }

      const ticket = await tickets.save(
        tickets.create({
          eventId,
          ownerId: userId,
          uniqueCode: this.generateUniqueCode(),
          status: 'valid',
          redeemedAt: null,
        }),
      );

      return ok({ ticket, event }, 'Ticket claimed');
    });

    if (!claimed.success) return claimed;

    const { ticket, event } = claimed.data;
    this.logger.log(
      `Ticket claimed: ticketId=${ticket.id} event=${eventId} user=${userId}`,
    );

    return ok(
      { ticket, token: this.tokenFor(ticket, event) },
      'Ticket claimed successfully',
    );
  }

  /**
   * Recomputes the QR token for a ticket. Signing is deterministic, so the
   * same ticket always produces the same string.
   */
  async getTicketToken(
    ticketId: string,
    requesterId: string,
  ): Promise<Result<string>> {
    const ticket = await this.ticketRepo.findOne({ where: { id: ticketId } });
    if (!ticket) return fail('not_found', 'Ticket not found');

    if (ticket.ownerId !== requesterId) {
      return fail('forbidden', 'Not ticket owner');
    }

    const event = await this.eventsService.findEventById(ticket.eventId);
    if (!event) return fail('not_found', 'Event not found');

    return ok(this.tokenFor(ticket, event), 'Ticket token generated');
  }

  async scanTicket(
    token: string,
    scannerId: string,
  ): Promise<Result<TicketEntity>> {
    // 1. Cryptographic check first: nothing about ticket existence leaks
    //    to a caller holding a forged or expired token.
    const verification = this.ticketTokenService.verify(token);
    if (!verification.isValid) {
      this.logger.warn(
        `Rejected ticket token (${verification.reason}) scanned by ${scannerId}`,
      );
      return fail('integrity', verification.message);
    }

    const { payload } = verification;

    // 2. Redeem under a serializable transaction so two gates scanning the
    //    same ticket cannot both succeed.
    const result = await runSerializable(this.dataSource, async (manager) => {
      const tickets = manager.getRepository(TicketEntity);
      const ticket = await tickets.findOne({ where: { id: payload.ticketId } });

      if (!ticket) return fail('not_found', 'Ticket not found');

      if (
        ticket.eventId !== payload.eventId ||
        ticket.uniqueCode !== payload.uniqueCode
      ) {
        return fail('integrity', 'Ticket does not match token');
      }

      if (ticket.status === 'used') {
        return fail('conflict', 'Ticket has already been used');
      }

      ticket.status = 'used';
      ticket.redeemedAt = new Date();
      const saved = await tickets.save(ticket);

      await this.auditService.log(
        {
          action: AuditAction.TICKET_REDEEMED,
          userId: scannerId,
          resourceId: saved.id,
          meta: { eventId: saved.eventId, ownerId: saved.ownerId },
        },
        manager,
      );

      return ok(saved, 'Ticket verified successfully');
    });

    if (result.success) {
      this.logger.log(
        `Ticket redeemed: ticketId=${result.data.id} scanner=${scannerId}`,
      );
    }

    return result;
  }

  // ─── Private helpers ───────────────────────────────────────────────────────

  private tokenFor(ticket: TicketEntity, event: Event): string {
    return this.ticketTokenService.sign({
      eventId: ticket.eventId,
      ticketId: ticket.id,
      uniqueCode: ticket.uniqueCode,
      eventDate: event.startDate,
    });
  }

  private generateUniqueCode(): string {
    return `TKT-${randomBytes(8).toString('hex').toUpperCase()}`;
  }
}
