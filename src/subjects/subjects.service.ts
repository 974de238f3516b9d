import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Subject } from './subject.entity';
import { Actor, assertRole } from '../auth/actor';
import { RecordNotFoundException, StateConflictException, ValidationException } from '../common/exceptions';
import { isUniqueViolation } from '../common/database-errors';
import { CreateSubjectDto } from '../dto/create-subject.dto';
import { UpdateSubjectDto } from '../dto/update-subject.dto';

@Injectable()
export class SubjectsService {
  private readonly logger = new Logger(SubjectsService.name);

  constructor(
    @InjectRepository(Subject)
    private readonly subjectRepository: Repository<Subject>,
  ) {}

  async findById(id: number): Promise<Subject | null> {
    return this.subjectRepository.findOne({ where: { id } });
  }

  async getById(id: number): Promise<Subject> {
    const subject = await this.findById(id);
    if (!subject) {
      throw new RecordNotFoundException(`Subject ${id} not found`);
    }
    return subject;
  }

  async findByIds(ids: number[]): Promise<Subject[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.subjectRepository.find({ where: { id: In(ids) }, order: { name: 'ASC' } });
  }

  async list(): Promise<Subject[]> {
    return this.subjectRepository.find({ order: { name: 'ASC' } });
  }

  async create(actor: Actor, dto: CreateSubjectDto): Promise<Subject> {
    assertRole(actor, 'admin');
    const name = dto.name.trim();
    if (!name) {
      throw new ValidationException('Subject name is required');
    }

    const existing = await this.subjectRepository.findOne({ where: { name } });
    if (existing) {
      throw new StateConflictException(`Subject '${name}' already exists`);
    }

    const subject = this.subjectRepository.create({
      name,
      description: dto.description?.trim() || null,
      createdBy: actor.id,
    });
    const saved = await this.save(subject);
    this.logger.log(`Subject created: ${saved.id} by admin ${actor.id}`);
    return saved;
  }

  /**
   * Only name and description are editable once a subject exists.
   */
  async update(actor: Actor, id: number, dto: UpdateSubjectDto): Promise<Subject> {
    assertRole(actor, 'admin');
    const subject = await this.getById(id);

    if (dto.name !== undefined) {
      const name = dto.name.trim();
      if (!name) {
        throw new ValidationException('Subject name is required');
      }
      subject.name = name;
    }
    if (dto.description !== undefined) subject.description = dto.description.trim() || null;

    return this.save(subject);
  }

  private async save(subject: Subject): Promise<Subject> {
    try {
      return await this.subjectRepository.save(subject);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictException(`Subject '${subject.name}' already exists`);
      }
      throw error;
    }
  }
}
