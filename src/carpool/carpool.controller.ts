import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CarpoolService } from './carpool.service';
import { DriversService } from './drivers.service';
import { CreateOfferDto } from './dto/create-offer.dto';
import { JoinOfferDto } from './dto/join-offer.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../common/utils/unwrap-result';

@ApiTags('Carpool')
@ApiBearerAuth()
@Controller('carpool')
@UseGuards(JwtAuthGuard)
export class CarpoolController {
  constructor(
    private readonly carpoolService: CarpoolService,
    private readonly driversService: DriversService,
  ) {}

  @Post('offers')
  @ApiOperation({ summary: 'Offer the caller’s vehicle for an event' })
  async createOffer(
    @Body() dto: CreateOfferDto,
    @Req() req: AuthenticatedRequest,
  ) {
    const driver = await this.driversService.getDriverForUser(req.user.id);
    if (!driver) {
      throw new NotFoundException('You are not registered as a driver');
    }
    return unwrapResult(
      await this.carpoolService.createOffer(driver.id, req.user.id, dto),
    );
  }

  @Get('events/:eventId/offers')
  eventOffers(@Param('eventId', ParseUUIDPipe) eventId: string) {
    return this.carpoolService.getEventOffers(eventId);
  }

  @Get('mine')
  mine(@Req() req: AuthenticatedRequest) {
    return this.carpoolService.getUserCarpools(req.user.id);
  }

  @Post('offers/:id/join')
  async join(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: JoinOfferDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.carpoolService.joinOffer(
        id,
        req.user.id,
        dto.pickupLocation,
        dto.notes,
      ),
    );
  }

  @Post('offers/:id/leave')
  async leave(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(await this.carpoolService.leaveOffer(id, req.user.id));
  }

  @Patch('offers/:id/cancel')
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(await this.carpoolService.cancelOffer(id, req.user.id));
  }

  @Patch('offers/:id/complete')
  async complete(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.carpoolService.completeOffer(id, req.user.id),
    );
  }
}
