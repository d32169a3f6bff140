import { ConfigService } from '@nestjs/config';
import { Env } from '../core/env.validation';

export const SESSION_OPTIONS = Symbol('SESSION_OPTIONS');

export interface SessionOptions {
  secret: string;
  issuer: string;
  /** Lifetime applied when `issue` is called without an explicit ttl. */
  ttlSeconds: number;
  /** Milliseconds since epoch. */
  now: () => number;
}

export function sessionOptionsFactory(configService: ConfigService<Env, true>): SessionOptions {
  return {
    secret: configService.get('JWT_SECRET', { infer: true }),
    issuer: configService.get('JWT_ISSUER', { infer: true }),
    ttlSeconds: configService.get('TOKEN_TTL_SECONDS', { infer: true }),
    now: Date.now,
  };
}
