import { Controller, Post, Body, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { TicketsService } from '../tickets.service';
import { VerifyTicketDto } from './dto/verify-ticket.dto';
import { Roles } from '../../common/decorators/roles.decorator';
import { RolesGuard } from '../../common/guards/roles.guard';
import { UserRole } from '../../users/enums/user-role.enum';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../../common/utils/unwrap-result';

@ApiTags('Tickets')
@ApiBearerAuth()
@Controller('tickets')
@UseGuards(JwtAuthGuard, RolesGuard)
export class VerificationController {
  constructor(private readonly ticketsService: TicketsService) {}

  @Post('scan')
  @Roles(UserRole.ADMIN, UserRole.ORGANIZER)
  @ApiOperation({ summary: 'Verify a scanned QR token and redeem the ticket' })
  async scan(@Body() dto: VerifyTicketDto, @Req() req: AuthenticatedRequest) {
    const { data: ticket } = unwrapResult(
      await this.ticketsService.scanTicket(dto.token, req.user.id),
    );

    return {
      message: 'Ticket verified successfully',
      ticketId: ticket.id,
      event: ticket.eventId,
      redeemedAt: ticket.redeemedAt,
    };
  }
}
