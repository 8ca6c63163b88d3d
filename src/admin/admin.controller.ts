import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../common/utils/unwrap-result';
import { UserRole } from '../users/enums/user-role.enum';
import { RoomsService } from '../rooms/rooms.service';
import { RentalsService } from '../rooms/rentals.service';
import { DisableRoomDto } from '../rooms/dto/disable-room.dto';
import { RentalReasonDto } from '../rooms/dto/rental-reason.dto';
import {
  RentalStatusFilterDto,
  RoomStatusFilterDto,
} from '../rooms/dto/list-rooms-query.dto';
import { DriversService } from '../carpool/drivers.service';
import { CarpoolService } from '../carpool/carpool.service';
import { SuspendDriverDto } from '../carpool/dto/suspend-driver.dto';
import { ReassignPassengerDto } from '../carpool/dto/reassign-passenger.dto';
import {
  DriverStatusFilterDto,
  PassengerFilterDto,
} from '../carpool/dto/list-carpool-query.dto';

@ApiTags('Admin')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(UserRole.ADMIN)
@Controller('admin')
export class AdminController {
  constructor(
    private readonly roomsService: RoomsService,
    private readonly rentalsService: RentalsService,
    private readonly driversService: DriversService,
    private readonly carpoolService: CarpoolService,
  ) {}

  // ── Rooms ─────────────────────────────────────────────────────────────────

  @Get('rooms')
  rooms(@Query() query: RoomStatusFilterDto) {
    return this.roomsService.getAllRooms(query.status);
  }

  @Patch('rooms/:id/disable')
  @ApiOperation({
    summary: 'Disable a room and reject its pending rental requests',
  })
  async disableRoom(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: DisableRoomDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.roomsService.disableRoom(
        id,
        req.user.id,
        dto.reason,
        dto.status,
      ),
    );
  }

  @Patch('rooms/:id/enable')
  async enableRoom(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(await this.roomsService.enableRoom(id, req.user.id));
  }

  // ── Rentals ───────────────────────────────────────────────────────────────

  @Get('rentals')
  rentals(@Query() query: RentalStatusFilterDto) {
    return this.rentalsService.getAllRentals(query.status);
  }

  @Patch('rentals/:id/cancel')
  @ApiOperation({ summary: 'Cancel any pending or approved rental' })
  async cancelRental(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RentalReasonDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.rentalsService.adminCancelRental(id, req.user.id, dto.reason),
    );
  }

  // ── Drivers ───────────────────────────────────────────────────────────────

  @Get('drivers')
  drivers(@Query() query: DriverStatusFilterDto) {
    return this.driversService.getAllDrivers(query.status);
  }

  @Get('drivers/flagged')
  flaggedDrivers() {
    return this.driversService.getFlaggedDrivers();
  }

  @Patch('drivers/:id/approve')
  async approveDriver(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.driversService.approveDriver(id, req.user.id),
    );
  }

  @Patch('drivers/:id/suspend')
  @ApiOperation({ summary: 'Suspend a driver and cancel its active offers' })
  async suspendDriver(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: SuspendDriverDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.driversService.suspendDriver(id, req.user.id, dto.reason),
    );
  }

  @Patch('drivers/:id/reinstate')
  async reinstateDriver(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.driversService.reinstateDriver(id, req.user.id),
    );
  }

  // ── Passengers ────────────────────────────────────────────────────────────

  @Get('passengers')
  passengers(@Query() query: PassengerFilterDto) {
    return this.carpoolService.getAllPassengers(query.eventId);
  }

  @Patch('passengers/:id/reassign')
  @ApiOperation({ summary: 'Move a passenger to another offer of the event' })
  async reassignPassenger(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ReassignPassengerDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.carpoolService.reassignPassenger(
        id,
        dto.newOfferId,
        req.user.id,
      ),
    );
  }
}
