import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { TicketsService } from './tickets.service';
import { TicketTokenService } from './ticket-token.service';
import { TicketEntity } from './entities/ticket.entity';
import { Event } from '../events/entities/event.entity';
import { EventsService } from '../events/events.service';
import { AuditService } from '../audit/audit.service';
import { AuditAction, AuditLog } from '../audit/entities/audit-log.entity';
import { UserRole } from '../users/enums/user-role.enum';
import {
  inMemoryDatabase,
  seedEvent,
  seedUser,
  TEST_TICKET_SECRET,
} from '../../test/utils/in-memory-database';

describe('TicketsService', () => {
  let moduleRef: TestingModule;
  let service: TicketsService;
  let tokens: TicketTokenService;
  let dataSource: DataSource;
  let event: Event;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        inMemoryDatabase(),
        TypeOrmModule.forFeature([TicketEntity, Event, AuditLog]),
      ],
      providers: [
        TicketsService,
        TicketTokenService,
        EventsService,
        AuditService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            TICKET_SIGNING_SECRET: TEST_TICKET_SECRET,
          }),
        },
      ],
    }).compile();

    service = moduleRef.get(TicketsService);
    tokens = moduleRef.get(TicketTokenService);
    dataSource = moduleRef.get(DataSource);

    const organizer = await seedUser(dataSource, UserRole.ORGANIZER);
    event = await seedEvent(dataSource, organizer.id);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('claimTicket', () => {
    it('issues a valid ticket with a verifiable token', async () => {
      const result = await service.claimTicket(event.id, 'student-1');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.ticket.status).toBe('valid');
      expect(result.data.ticket.uniqueCode).toMatch(/^TKT-[0-9A-F]{16}$/);

      const verification = tokens.verify(result.data.token);
      expect(verification.isValid).toBe(true);
      if (!verification.isValid) return;
      expect(verification.payload.ticketId).toBe(result.data.ticket.id);
    });

    it('allows one ticket per user per event', async () => {
      await service.claimTicket(event.id, 'student-1');

      await expect(service.claimTicket(event.id, 'student-1')).resolves.toEqual({
        success: false,
        kind: 'conflict',
        message: 'You already have a ticket for this event',
      });
    });

    it('stops issuing at the attendee limit', async () => {
      await dataSource.getRepository(Event).update(event.id, { maxAttendees: 1 });
      await service.claimTicket(event.id, 'student-1');

      await expect(service.claimTicket(event.id, 'student-2')).resolves.toEqual({
        success: false,
        kind: 'conflict',
        message: 'Event is sold out',
      });
    });

    it('reports unknown events', async () => {
      await expect(
        service.claimTicket('00000000-0000-4000-8000-000000000000', 'student-1'),
      ).resolves.toEqual({
        success: false,
        kind: 'not_found',
        message: 'Event not found',
      });
    });
  });

  describe('getTicketToken', () => {
    it('regenerates the token handed out at claim time', async () => {
      const claimed = await service.claimTicket(event.id, 'student-1');
      if (!claimed.success) throw new Error(claimed.message);

      const result = await service.getTicketToken(
        claimed.data.ticket.id,
        'student-1',
      );

      expect(result).toEqual({
        success: true,
        message: 'Ticket token generated',
        data: claimed.data.token,
      });
    });

    it('only serves the token to the ticket owner', async () => {
      const claimed = await service.claimTicket(event.id, 'student-1');
      if (!claimed.success) throw new Error(claimed.message);

      await expect(
        service.getTicketToken(claimed.data.ticket.id, 'student-2'),
      ).resolves.toEqual({
        success: false,
        kind: 'forbidden',
        message: 'Not ticket owner',
      });
    });
  });

  describe('scanTicket', () => {
    it('redeems a ticket once and records the scan', async () => {
      const claimed = await service.claimTicket(event.id, 'student-1');
      if (!claimed.success) throw new Error(claimed.message);

      const first = await service.scanTicket(claimed.data.token, 'scanner-1');
      expect(first.success).toBe(true);
      if (!first.success) return;
      expect(first.message).toBe('Ticket verified successfully');
      expect(first.data.status).toBe('used');
      expect(first.data.redeemedAt).toBeInstanceOf(Date);

      const audit = await dataSource
        .getRepository(AuditLog)
        .find({ where: { resourceId: claimed.data.ticket.id } });
      expect(audit).toHaveLength(1);
      expect(audit[0].action).toBe(AuditAction.TICKET_REDEEMED);
      expect(audit[0].userId).toBe('scanner-1');

      await expect(
        service.scanTicket(claimed.data.token, 'scanner-2'),
      ).resolves.toEqual({
        success: false,
        kind: 'conflict',
        message: 'Ticket has already been used',
      });
    });

    it('rejects forged tokens before touching the database', async () => {
      const forged = JSON.stringify({ payload: 'e30=', signature: 'AAAA' });

      await expect(service.scanTicket(forged, 'scanner-1')).resolves.toEqual({
        success: false,
        kind: 'integrity',
        message: 'Invalid signature - token may be forged or tampered',
      });
    });

    it('reports authentic tokens for tickets that do not exist', async () => {
      const token = tokens.sign({
        eventId: event.id,
        ticketId: '00000000-0000-4000-8000-000000000000',
        uniqueCode: 'TKT-0000000000000000',
        eventDate: event.startDate,
      });

      await expect(service.scanTicket(token, 'scanner-1')).resolves.toEqual({
        success: false,
        kind: 'not_found',
        message: 'Ticket not found',
      });
    });

    it('rejects a token whose code does not match the stored ticket', async () => {
      const claimed = await service.claimTicket(event.id, 'student-1');
      if (!claimed.success) throw new Error(claimed.message);

      const token = tokens.sign({
        eventId: event.id,
        ticketId: claimed.data.ticket.id,
        uniqueCode: 'TKT-FFFFFFFFFFFFFFFF',
        eventDate: event.startDate,
      });

      await expect(service.scanTicket(token, 'scanner-1')).resolves.toEqual({
        success: false,
        kind: 'integrity',
        message: 'Ticket does not match token',
      });
    });
  });
});
