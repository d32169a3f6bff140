import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { InvalidTokenError } from '../core/errors';
import { extractBearerToken } from '../session/bearer';
import { SessionClaims, SessionService } from '../session/session.service';
import { User } from './user.entity';
import { UserService } from './user.service';

export interface AuthenticatedRequest extends Request {
  user?: User;
  auth?: SessionClaims & { token: string };
}

@Injectable()
export class TokenAuthGuard implements CanActivate {
  private readonly logger = new Logger(TokenAuthGuard.name);

  constructor(
    private readonly sessionService: SessionService,
    private readonly userService: UserService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw new UnauthorizedException('Missing bearer token');
    }

    let claims: SessionClaims;
    try {
      claims = await this.sessionService.validate(token);
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        this.logger.debug(`Rejected ${error.reason} token on ${req.method} ${req.path}`);
      }
      throw error;
    }

    // the identity may have been deactivated after the token was issued
    const user = await this.userService.findById(claims.identityId);
    if (!user) {
      throw new InvalidTokenError('revoked');
    }

    req.user = user;
    req.auth = { ...claims, token };
    return true;
  }
}
