import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { RentalsService } from './rentals.service';
import { RequestRentalDto } from './dto/request-rental.dto';
import { RentalReasonDto } from './dto/rental-reason.dto';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../common/utils/unwrap-result';
import { UserRole } from '../users/enums/user-role.enum';

@ApiTags('Rentals')
@ApiBearerAuth()
@Controller('rentals')
@UseGuards(JwtAuthGuard, RolesGuard)
export class RentalsController {
  constructor(private readonly rentalsService: RentalsService) {}

  @Post()
  @ApiOperation({ summary: 'Request a room for a time range (starts pending)' })
  async request(
    @Body() dto: RequestRentalDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.rentalsService.requestRental(dto.roomId, req.user.id, {
        startTime: new Date(dto.startTime),
        endTime: new Date(dto.endTime),
        purpose: dto.purpose,
        expectedAttendees: dto.expectedAttendees,
      }),
    );
  }

  @Get('mine')
  mine(@Req() req: AuthenticatedRequest) {
    return this.rentalsService.getUserRentals(req.user.id);
  }

  @Get('pending')
  @Roles(UserRole.ORGANIZER, UserRole.ADMIN)
  pending(@Req() req: AuthenticatedRequest) {
    return this.rentalsService.getPendingRentalsForOrganizer(req.user.id);
  }

  @Patch(':id/cancel')
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(await this.rentalsService.cancelRental(id, req.user.id));
  }

  @Patch(':id/approve')
  @Roles(UserRole.ORGANIZER, UserRole.ADMIN)
  async approve(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.rentalsService.approveRental(
        id,
        req.user.id,
        req.user.role === UserRole.ADMIN,
      ),
    );
  }

  @Patch(':id/reject')
  @Roles(UserRole.ORGANIZER, UserRole.ADMIN)
  async reject(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RentalReasonDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.rentalsService.rejectRental(
        id,
        req.user.id,
        req.user.role === UserRole.ADMIN,
        dto.reason,
      ),
    );
  }

  @Patch(':id/complete')
  @Roles(UserRole.ORGANIZER, UserRole.ADMIN)
  async complete(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.rentalsService.completeRental(
        id,
        req.user.id,
        req.user.role === UserRole.ADMIN,
      ),
    );
  }
}
