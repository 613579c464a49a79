// src/modules/auth/roles.guard.ts
import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  SetMetadata,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthenticationNotFoundError } from './auth.errors';
import type { AuthenticatedRequest } from './current-user.decorator';
import type { Role } from './types/role';

export const ROLES_KEY = 'roles';

/** Restrict a handler (or controller) to principals holding one of `roles`. */
export const Roles = (...roles: Role[]) => SetMetadata(ROLES_KEY, roles);

/**
 * Role-based authorization. Must run after JwtAuthGuard.
 * No principal -> 401; principal without a matching authority -> 403.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<Role[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!required || required.length === 0) return true;

    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!user) {
      throw new AuthenticationNotFoundError('No authenticated principal on request');
    }
    if (required.some((role) => user.authorities.includes(`ROLE_${role}`))) return true;

    throw new ForbiddenException();
  }
}
