import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { Actor, isActor } from './actor';

export const CurrentActor = createParamDecorator((_data: unknown, ctx: ExecutionContext): Actor => {
  const request = ctx.switchToHttp().getRequest<Request>();
  // populated by passport once the JWT strategy has validated the token
  const user: unknown = Reflect.get(request, 'user');
  if (!isActor(user)) {
    throw new UnauthorizedException('Access token required');
  }
  return user;
});
