import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../common/utils/unwrap-result';
import { TicketsService } from './tickets.service';
import { ClaimTicketDto } from './dto/claim-ticket.dto';

@ApiTags('Tickets')
@ApiBearerAuth()
@Controller('tickets')
@UseGuards(JwtAuthGuard) // ← Applies to every endpoint in this controller
export class TicketsController {
  constructor(private readonly ticketsService: TicketsService) {}

  /**
   * POST /tickets/claim
   * Claims a ticket for the authenticated user and returns its QR token.
   */
  @Post('claim')
  async claim(@Body() dto: ClaimTicketDto, @Req() req: AuthenticatedRequest) {
    return unwrapResult(
      await this.ticketsService.claimTicket(dto.eventId, req.user.id),
    );
  }

  /**
   * GET /tickets/:ticketId/token
   * Regenerates the QR token; identical on every call for the same ticket.
   */
  @Get(':ticketId/token')
  async token(
    @Param('ticketId', ParseUUIDPipe) ticketId: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.ticketsService.getTicketToken(ticketId, req.user.id),
    );
  }
}
