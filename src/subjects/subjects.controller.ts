import { Body, Controller, Get, Logger, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { SubjectsService } from './subjects.service';
import { CurrentActor } from '../auth/current-actor.decorator';
import { Actor } from '../auth/actor';
import { CreateSubjectDto } from '../dto/create-subject.dto';
import { UpdateSubjectDto } from '../dto/update-subject.dto';

@Controller('subjects')
export class SubjectsController {
  private readonly logger = new Logger(SubjectsController.name);

  constructor(private readonly subjectsService: SubjectsService) {}

  @Get()
  async list() {
    return this.subjectsService.list();
  }

  @Get(':id')
  async getOne(@Param('id', ParseIntPipe) id: number) {
    return this.subjectsService.getById(id);
  }

  @Post()
  async create(@CurrentActor() actor: Actor, @Body() dto: CreateSubjectDto) {
    this.logger.log(`Creating subject '${dto.name}' for admin ${actor.id}`);
    return this.subjectsService.create(actor, dto);
  }

  @Patch(':id')
  async update(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateSubjectDto,
  ) {
    return this.subjectsService.update(actor, id, dto);
  }
}
