import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { WeaknessesService } from './weaknesses.service';
import { CurrentActor } from '../auth/current-actor.decorator';
import { Actor } from '../auth/actor';
import { CreateWeaknessDto } from '../dto/create-weakness.dto';
import { WeaknessQueryDto } from '../dto/weakness-query.dto';

@Controller('weaknesses')
export class WeaknessesController {
  constructor(private readonly weaknessesService: WeaknessesService) {}

  @Get('me')
  async mine(@CurrentActor() actor: Actor, @Query() query: WeaknessQueryDto) {
    return this.weaknessesService.listForStudent(actor, query.subjectId);
  }

  @Get()
  async listAll(@CurrentActor() actor: Actor) {
    return this.weaknessesService.listAll(actor);
  }

  @Get('subjects/:subjectId')
  async forSubject(@CurrentActor() actor: Actor, @Param('subjectId', ParseIntPipe) subjectId: number) {
    return this.weaknessesService.listForSubject(actor, subjectId);
  }

  @Get('subjects/:subjectId/weakest-students')
  async weakestStudents(
    @CurrentActor() actor: Actor,
    @Param('subjectId', ParseIntPipe) subjectId: number,
    @Query() query: WeaknessQueryDto,
  ) {
    return this.weaknessesService.weakestStudents(actor, subjectId, query.limit);
  }

  @Post()
  async add(@CurrentActor() actor: Actor, @Body() dto: CreateWeaknessDto) {
    return this.weaknessesService.add(actor, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.weaknessesService.delete(actor, id);
  }
}
