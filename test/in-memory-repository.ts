import { FindManyOptions, FindOneOptions, FindOperator, FindOptionsWhere, QueryFailedError } from 'typeorm';

type Criteria<T> = number | FindOptionsWhere<T> | FindOptionsWhere<T>[];

export interface InMemoryRepositoryOptions<T> {
  // column groups that behave like a UNIQUE constraint
  unique?: (keyof T & string)[][];
  // column values filled in on insert when the entity leaves them undefined
  defaults?: () => Partial<T>;
}

/**
 * Stand-in for a TypeORM repository that keeps rows in process. It covers the
 * subset of the Repository API the services call, including `In`, `IsNull`
 * and `ILike` operators and unique-violation errors shaped like the
 * PostgreSQL driver's.
 */
export class InMemoryRepository<T extends { id: number }> {
  private rows: T[] = [];
  private nextId = 1;

  constructor(
    private readonly factory: () => T,
    private readonly options: InMemoryRepositoryOptions<T> = {},
  ) {}

  /** Current rows, as copies. */
  all(): T[] {
    return this.rows.map(row => this.clone(row));
  }

  /**
   * Captures the current rows and returns a function that puts them back.
   * Ids handed out meanwhile are not reused, as with a PostgreSQL sequence.
   */
  snapshot(): () => void {
    const rows = this.rows.map(row => this.clone(row));
    return () => {
      this.rows = rows;
    };
  }

  create(data: Partial<T>): T {
    return Object.assign(this.factory(), data);
  }

  save(entity: T): Promise<T>;
  save(entities: T[]): Promise<T[]>;
  async save(input: T | T[]): Promise<T | T[]> {
    if (Array.isArray(input)) {
      const saved: T[] = [];
      for (const entity of input) {
        saved.push(this.saveOne(entity));
      }
      return saved;
    }
    return this.saveOne(input);
  }

  async find(options: FindManyOptions<T> = {}): Promise<T[]> {
    let found = this.rows.filter(row => this.matchesAny(row, options.where));
    if (options.order) {
      found = sortRows(found, Object.entries(options.order));
    }
    const skip = options.skip ?? 0;
    const end = options.take !== undefined ? skip + options.take : undefined;
    return found.slice(skip, end).map(row => this.clone(row));
  }

  async findBy(where: FindOptionsWhere<T> | FindOptionsWhere<T>[]): Promise<T[]> {
    return this.find({ where });
  }

  async findOne(options: FindOneOptions<T>): Promise<T | null> {
    const [first] = await this.find({ where: options.where, order: options.order, take: 1 });
    return first ?? null;
  }

  async findOneBy(where: FindOptionsWhere<T> | FindOptionsWhere<T>[]): Promise<T | null> {
    return this.findOne({ where });
  }

  async count(options: FindManyOptions<T> = {}): Promise<number> {
    return this.rows.filter(row => this.matchesAny(row, options.where)).length;
  }

  async update(criteria: Criteria<T>, changes: Partial<T>): Promise<{ affected: number; raw: unknown[]; generatedMaps: unknown[] }> {
    const matched = this.rows.filter(row => this.matchesAny(row, toWhere(criteria)));
    for (const row of matched) {
      Object.assign(row, changes);
    }
    return { affected: matched.length, raw: [], generatedMaps: [] };
  }

  async delete(criteria: Criteria<T>): Promise<{ affected: number; raw: unknown[] }> {
    const before = this.rows.length;
    this.rows = this.rows.filter(row => !this.matchesAny(row, toWhere(criteria)));
    return { affected: before - this.rows.length, raw: [] };
  }

  private saveOne(entity: T): T {
    const existing = entity.id ? this.rows.find(row => row.id === entity.id) : undefined;
    if (!existing) {
      const defaults = this.options.defaults?.() ?? {};
      for (const [key, value] of Object.entries(defaults)) {
        if (Reflect.get(entity, key) === undefined) {
          Reflect.set(entity, key, value);
        }
      }
    }
    this.assertUnique(entity);

    if (existing) {
      Object.assign(existing, entity);
    } else {
      if (!entity.id) {
        Reflect.set(entity, 'id', this.nextId++);
      }
      this.rows.push(this.clone(entity));
    }
    return entity;
  }

  private assertUnique(entity: T): void {
    for (const columns of this.options.unique ?? []) {
      const clash = this.rows.some(row =>
        row.id !== entity.id && columns.every(column => row[column] === entity[column]),
      );
      if (clash) {
        const driverError = Object.assign(new Error(`duplicate key value violates unique constraint (${columns.join(', ')})`), {
          code: '23505',
        });
        throw new QueryFailedError('INSERT', [], driverError);
      }
    }
  }

  private matchesAny(row: T, where: object | object[] | undefined): boolean {
    if (where === undefined) {
      return true;
    }
    const clauses = Array.isArray(where) ? where : [where];
    return clauses.some(clause => matches(row, clause));
  }

  private clone(row: T): T {
    return Object.assign(this.factory(), row);
  }
}

function toWhere<T>(criteria: Criteria<T>): object | object[] {
  if (typeof criteria === 'number') {
    return { id: criteria };
  }
  return criteria;
}

function matches<T extends object>(row: T, clause: object): boolean {
  return Object.entries(clause).every(([key, expected]) => {
    const actual: unknown = Reflect.get(row, key);
    if (expected instanceof FindOperator) {
      return matchesOperator(actual, expected);
    }
    return sameValue(actual, expected);
  });
}

function matchesOperator(actual: unknown, operator: FindOperator<unknown>): boolean {
  const value: unknown = operator.value;
  switch (operator.type) {
    case 'in':
      return Array.isArray(value) && value.some(candidate => sameValue(actual, candidate));
    case 'isNull':
      return actual === null || actual === undefined;
    case 'ilike': {
      if (typeof actual !== 'string' || typeof value !== 'string') {
        return false;
      }
      return likeToRegExp(value).test(actual);
    }
    default:
      throw new Error(`Operator '${operator.type}' is not supported by InMemoryRepository`);
  }
}

// LIKE pattern with backslash escapes, matched case-insensitively
function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, 'is');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sameValue(actual: unknown, expected: unknown): boolean {
  if (actual instanceof Date && expected instanceof Date) {
    return actual.getTime() === expected.getTime();
  }
  return actual === expected;
}

function sortRows<T extends object>(rows: T[], order: [string, unknown][]): T[] {
  return [...rows].sort((a, b) => {
    for (const [key, direction] of order) {
      const result = compare(Reflect.get(a, key), Reflect.get(b, key));
      if (result !== 0) {
        return direction === 'DESC' || direction === 'desc' ? -result : result;
      }
    }
    return 0;
  });
}

function compare(a: unknown, b: unknown): number {
  if (a === b) return 0;
  // NULLs last in ascending order, as PostgreSQL sorts them
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}
