import { Body, Controller, Get, Logger, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { UsersService } from './users.service';
import { CurrentActor } from '../auth/current-actor.decorator';
import { Actor } from '../auth/actor';
import { CreateUserDto } from '../dto/create-user.dto';
import { SetUserActiveDto } from '../dto/set-user-active.dto';
import { ListUsersQueryDto } from '../dto/list-users-query.dto';
import { PermissionDeniedException } from '../common/exceptions';

@Controller('users')
export class UsersController {
  private readonly logger = new Logger(UsersController.name);

  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  async me(@CurrentActor() actor: Actor) {
    return this.usersService.getById(actor.id);
  }

  @Get()
  async list(@CurrentActor() actor: Actor, @Query() query: ListUsersQueryDto) {
    return this.usersService.list(actor, { role: query.role, search: query.search });
  }

  @Get(':id')
  async getOne(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number) {
    if (actor.role !== 'admin' && actor.id !== id) {
      throw new PermissionDeniedException('You may only view your own profile');
    }
    return this.usersService.getById(id);
  }

  @Post()
  async create(@CurrentActor() actor: Actor, @Body() dto: CreateUserDto) {
    this.logger.log(`Creating ${dto.role} '${dto.username}'`);
    return this.usersService.createUser(actor, dto);
  }

  @Patch(':id/active')
  async setActive(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SetUserActiveDto,
  ) {
    return this.usersService.setActive(actor, id, dto.active);
  }
}
