import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Weakness } from './weakness.entity';
import { AccessService } from '../workflow/access.service';
import { UsersService } from '../users/users.service';
import { Actor, assertRole } from '../auth/actor';
import { RecordNotFoundException, ValidationException } from '../common/exceptions';
import { CreateWeaknessDto } from '../dto/create-weakness.dto';

export interface WeakStudentView {
  studentId: number;
  username: string;
  fullName: string | null;
  weaknessCount: number;
}

@Injectable()
export class WeaknessesService {
  private readonly logger = new Logger(WeaknessesService.name);

  constructor(
    @InjectRepository(Weakness)
    private readonly weaknessRepository: Repository<Weakness>,
    private readonly accessService: AccessService,
    private readonly usersService: UsersService,
  ) {}

  async add(actor: Actor, dto: CreateWeaknessDto): Promise<Weakness> {
    assertRole(actor, 'student');
    const weaknessType = dto.weaknessType.trim();
    if (!weaknessType) {
      throw new ValidationException('Weakness type is required');
    }
    await this.accessService.assertCanAccessSubject(actor, dto.subjectId);
    return this.record(actor.id, dto.subjectId, weaknessType, dto.description?.trim() || null);
  }

  /**
   * Stores a weakness without access checks; callers have already verified
   * enrollment. Pass `manager` to write inside the caller's transaction.
   */
  async record(
    userId: number,
    subjectId: number,
    weaknessType: string,
    description: string | null,
    manager?: EntityManager,
  ): Promise<Weakness> {
    const repository = manager ? manager.getRepository(Weakness) : this.weaknessRepository;
    const saved = await repository.save(repository.create({ userId, subjectId, weaknessType, description }));
    this.logger.log(`Weakness '${weaknessType}' recorded for user ${userId} in subject ${subjectId}`);
    return saved;
  }

  async listForStudent(actor: Actor, subjectId?: number): Promise<Weakness[]> {
    assertRole(actor, 'student');
    const where: FindOptionsWhere<Weakness> = subjectId ? { userId: actor.id, subjectId } : { userId: actor.id };
    return this.weaknessRepository.find({ where, order: { createdAt: 'DESC', id: 'DESC' } });
  }

  async delete(actor: Actor, weaknessId: number): Promise<void> {
    assertRole(actor, 'student');
    const result = await this.weaknessRepository.delete({ id: weaknessId, userId: actor.id });
    if (!result.affected) {
      throw new RecordNotFoundException('Weakness not found');
    }
  }

  async listForSubject(actor: Actor, subjectId: number): Promise<Weakness[]> {
    assertRole(actor, 'teacher', 'admin');
    await this.accessService.assertCanManageSubject(actor, subjectId);
    return this.weaknessRepository.find({ where: { subjectId }, order: { createdAt: 'DESC', id: 'DESC' } });
  }

  async listAll(actor: Actor): Promise<Weakness[]> {
    assertRole(actor, 'admin');
    return this.weaknessRepository.find({ order: { createdAt: 'DESC', id: 'DESC' } });
  }

  /**
   * Students of the subject ranked by how many weaknesses they have recorded.
   */
  async weakestStudents(actor: Actor, subjectId: number, limit = 10): Promise<WeakStudentView[]> {
    assertRole(actor, 'teacher', 'admin');
    await this.accessService.assertCanManageSubject(actor, subjectId);

    const weaknesses = await this.weaknessRepository.find({ where: { subjectId } });
    const counts = new Map<number, number>();
    for (const weakness of weaknesses) {
      counts.set(weakness.userId, (counts.get(weakness.userId) ?? 0) + 1);
    }

    const users = await this.usersService.findByIds(Array.from(counts.keys()));
    return users
      .filter(user => user.role === 'student')
      .map(user => ({
        studentId: user.id,
        username: user.username,
        fullName: user.fullName,
        weaknessCount: counts.get(user.id) ?? 0,
      }))
      .sort((a, b) => b.weaknessCount - a.weaknessCount || a.studentId - b.studentId)
      .slice(0, limit);
  }
}
