import {
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { RoomsService } from './rooms.service';
import { CreateRoomDto } from './dto/create-room.dto';
import { UpdateRoomDto } from './dto/update-room.dto';
import { AvailableRoomsQueryDto } from './dto/available-rooms-query.dto';
import { ListRoomsQueryDto } from './dto/list-rooms-query.dto';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../common/utils/unwrap-result';
import { UserRole } from '../users/enums/user-role.enum';

@ApiTags('Rooms')
@ApiBearerAuth()
@Controller('rooms')
@UseGuards(JwtAuthGuard, RolesGuard)
export class RoomsController {
  constructor(private readonly roomsService: RoomsService) {}

  @Post()
  @Roles(UserRole.ORGANIZER)
  async create(@Body() dto: CreateRoomDto, @Req() req: AuthenticatedRequest) {
    return unwrapResult(await this.roomsService.createRoom(req.user.id, dto));
  }

  @Get()
  list(@Query() query: ListRoomsQueryDto) {
    return this.roomsService.getRooms(query.minCapacity);
  }

  @Get('available')
  @ApiOperation({ summary: 'Enabled rooms free for the whole time range' })
  async available(@Query() query: AvailableRoomsQueryDto) {
    return unwrapResult(
      await this.roomsService.getAvailableRooms(
        new Date(query.start),
        new Date(query.end),
        query.minCapacity,
      ),
    );
  }

  @Get('mine')
  @Roles(UserRole.ORGANIZER)
  mine(@Req() req: AuthenticatedRequest) {
    return this.roomsService.getOrganizerRooms(req.user.id);
  }

  @Put(':id')
  @Roles(UserRole.ORGANIZER)
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateRoomDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.roomsService.updateRoom(id, req.user.id, dto),
    );
  }
}
