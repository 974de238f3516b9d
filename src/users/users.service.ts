import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, ILike, In, Repository } from 'typeorm';
import { User } from './user.entity';
import { Actor, UserRole, assertRole } from '../auth/actor';
import { RecordNotFoundException, StateConflictException } from '../common/exceptions';
import { isUniqueViolation } from '../common/database-errors';
import { CreateUserDto } from '../dto/create-user.dto';

export interface UserFilter {
  role?: UserRole;
  search?: string;
}

// PostgreSQL LIKE uses backslash as its default escape character
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async getById(id: number): Promise<User> {
    const user = await this.findById(id);
    if (!user) {
      throw new RecordNotFoundException(`User ${id} not found`);
    }
    return user;
  }

  async findByIds(ids: number[]): Promise<User[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.userRepository.find({ where: { id: In(ids) } });
  }

  async findActiveByRole(role: UserRole): Promise<User[]> {
    return this.userRepository.find({ where: { role, isActive: true }, order: { fullName: 'ASC' } });
  }

  async createUser(actor: Actor, dto: CreateUserDto): Promise<User> {
    assertRole(actor, 'admin');

    const existing = await this.userRepository.findOne({ where: { username: dto.username } });
    if (existing) {
      throw new StateConflictException('Username already exists');
    }

    const user = this.userRepository.create({
      username: dto.username,
      role: dto.role,
      email: dto.email ?? null,
      fullName: dto.fullName ?? null,
      isActive: true,
      lastLogin: null,
    });

    try {
      const saved = await this.userRepository.save(user);
      this.logger.log(`User ${saved.id} (${saved.role}) created by admin ${actor.id}`);
      return saved;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StateConflictException('Username already exists');
      }
      throw error;
    }
  }

  /**
   * Users are never deleted; deactivation blocks their tokens instead.
   */
  async setActive(actor: Actor, userId: number, active: boolean): Promise<User> {
    assertRole(actor, 'admin');
    const user = await this.getById(userId);
    user.isActive = active;
    const saved = await this.userRepository.save(user);
    this.logger.log(`User ${userId} ${active ? 'activated' : 'deactivated'} by admin ${actor.id}`);
    return saved;
  }

  async list(actor: Actor, filter: UserFilter = {}): Promise<User[]> {
    assertRole(actor, 'admin');
    const base: FindOptionsWhere<User> = filter.role ? { role: filter.role } : {};
    const search = filter.search?.trim();
    const pattern = search ? `%${escapeLikePattern(search)}%` : '';
    const where: FindOptionsWhere<User>[] = search
      ? [
          { ...base, username: ILike(pattern) },
          { ...base, fullName: ILike(pattern) },
          { ...base, email: ILike(pattern) },
        ]
      : [base];
    return this.userRepository.find({ where, order: { createdAt: 'DESC' } });
  }

  /**
   * Records the first request made with a freshly issued token.
   */
  async touchLastLogin(user: User, issuedAtSeconds?: number): Promise<void> {
    const issuedAt = issuedAtSeconds ? new Date(issuedAtSeconds * 1000) : null;
    if (user.lastLogin && (!issuedAt || user.lastLogin >= issuedAt)) {
      return;
    }
    user.lastLogin = new Date();
    await this.userRepository.update(user.id, { lastLogin: user.lastLogin });
  }
}
