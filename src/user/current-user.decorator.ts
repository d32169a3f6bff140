import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { AuthenticatedRequest } from './auth.guard';

/**
 * Identity resolved by `TokenAuthGuard`.
 *
 * Usage: `profile(@CurrentUser() user: User) { ... }`
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!req.user) throw new UnauthorizedException();
  return req.user;
});

// Validated claims and raw token of the current request.
export const CurrentSession = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!req.auth) throw new UnauthorizedException();
  return req.auth;
});
