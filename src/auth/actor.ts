import { PermissionDeniedException } from '../common/exceptions';

export const USER_ROLES = ['admin', 'teacher', 'student'] as const;
export type UserRole = typeof USER_ROLES[number];

/**
 * The authenticated caller of a service operation.
 * Controllers resolve it from the bearer token and pass it explicitly.
 */
export interface Actor {
  id: number;
  role: UserRole;
}

export interface JwtPayload {
  sub: number;
  role?: UserRole;
  iat?: number;
}

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && (USER_ROLES as readonly string[]).includes(value);
}

export function isActor(value: unknown): value is Actor {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return typeof Reflect.get(value, 'id') === 'number' && isUserRole(Reflect.get(value, 'role'));
}

/**
 * Role precondition evaluated before any read or write of an operation.
 */
export function assertRole(actor: Actor | null | undefined, ...roles: UserRole[]): Actor {
  if (!actor) {
    throw new PermissionDeniedException('Authentication required');
  }
  if (!roles.includes(actor.role)) {
    throw new PermissionDeniedException(`Role '${actor.role}' may not perform this action`);
  }
  return actor;
}
