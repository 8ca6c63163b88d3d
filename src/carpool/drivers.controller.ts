import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Post,
  Put,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { DriversService } from './drivers.service';
import { RegisterDriverDto } from './dto/register-driver.dto';
import { UpdateDriverDto } from './dto/update-driver.dto';
import { Roles } from '../common/decorators/roles.decorator';
import { RolesGuard } from '../common/guards/roles.guard';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request.interface';
import { unwrapResult } from '../common/utils/unwrap-result';
import { UserRole } from '../users/enums/user-role.enum';

@ApiTags('Carpool')
@ApiBearerAuth()
@Controller('drivers')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(UserRole.STUDENT, UserRole.ORGANIZER)
export class DriversController {
  constructor(private readonly driversService: DriversService) {}

  @Post()
  @ApiOperation({ summary: 'Register as a driver (pending admin approval)' })
  async register(
    @Body() dto: RegisterDriverDto,
    @Req() req: AuthenticatedRequest,
  ) {
    return unwrapResult(
      await this.driversService.registerDriver(req.user.id, dto),
    );
  }

  @Get('me')
  async me(@Req() req: AuthenticatedRequest) {
    const driver = await this.driversService.getDriverForUser(req.user.id);
    if (!driver) {
      throw new NotFoundException('You are not registered as a driver');
    }
    return driver;
  }

  @Put('me')
  async update(@Body() dto: UpdateDriverDto, @Req() req: AuthenticatedRequest) {
    const driver = await this.me(req);
    return unwrapResult(
      await this.driversService.updateDriver(driver.id, req.user.id, dto),
    );
  }
}
