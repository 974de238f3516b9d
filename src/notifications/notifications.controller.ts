import { Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Patch, Query } from '@nestjs/common';
import { NotificationsService } from './notifications.service';
import { CurrentActor } from '../auth/current-actor.decorator';
import { Actor } from '../auth/actor';
import { PaginationQueryDto } from '../dto/pagination-query.dto';

@Controller('notifications')
export class NotificationsController {
  constructor(private readonly notificationsService: NotificationsService) {}

  @Get()
  async list(@CurrentActor() actor: Actor, @Query() query: PaginationQueryDto) {
    return this.notificationsService.list(actor, query.limit, query.offset);
  }

  @Get('recent')
  async recent(@CurrentActor() actor: Actor) {
    return this.notificationsService.recent(actor);
  }

  @Get('unread-count')
  async unreadCount(@CurrentActor() actor: Actor) {
    return { count: await this.notificationsService.unreadCount(actor) };
  }

  @Patch('read-all')
  async markAllRead(@CurrentActor() actor: Actor) {
    return { updated: await this.notificationsService.markAllRead(actor) };
  }

  @Patch(':id/read')
  @HttpCode(204)
  async markRead(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.notificationsService.markRead(id, actor);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.notificationsService.delete(id, actor);
  }
}
