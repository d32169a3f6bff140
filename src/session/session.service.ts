import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import jwt, { JsonWebTokenError, JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { LessThanOrEqual, Repository } from 'typeorm';
import { v4 } from 'uuid';
import { z } from 'zod';
import { InvalidTokenError } from '../core/errors';
import { RevokedToken } from './revoked-token.entity';
import { SESSION_OPTIONS, SessionOptions } from './session.options';

export interface IssuedToken {
  token: string;
  tokenId: string;
  identityId: number;
  issuedAt: Date;
  expiresAt: Date;
}

export interface SessionClaims {
  identityId: number;
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
}

const claimsSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/),
  jti: z.string().uuid(),
  iat: z.number().int(),
  exp: z.number().int(),
});

type TokenClaims = z.infer<typeof claimsSchema>;

/**
 * Issues and validates signed bearer tokens.
 *
 * Tokens are HS256 JWTs carrying the identity id (`sub`), a token id (`jti`),
 * `iat` and `exp`. Logout records the `jti` in the revocation table until the
 * token would have expired anyway.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    @Inject(SESSION_OPTIONS)
    private readonly options: SessionOptions,
    @InjectRepository(RevokedToken)
    private readonly revokedTokenRepository: Repository<RevokedToken>,
  ) {}

  issue(identityId: number, ttlSeconds: number = this.options.ttlSeconds): IssuedToken {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`ttl must be a positive whole number of seconds, got ${ttlSeconds}`);
    }

    const iat = this.nowSeconds();
    const exp = iat + ttlSeconds;
    const jti = v4();
    const token = jwt.sign({ sub: String(identityId), jti, iat, exp }, this.options.secret, {
      algorithm: 'HS256',
      issuer: this.options.issuer,
    });

    return {
      token,
      tokenId: jti,
      identityId,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  async validate(token: string): Promise<SessionClaims> {
    const claims = this.verify(token, false);
    if (!claims) throw new InvalidTokenError('malformed');

    const revoked = await this.revokedTokenRepository.existsBy({ jti: claims.jti });
    if (revoked) throw new InvalidTokenError('revoked');

    return toSessionClaims(claims);
  }

  /**
   * Revokes a token. Malformed, expired and already revoked tokens are
   * left as they are.
   */
  async invalidate(token: string): Promise<void> {
    const claims = this.verify(token, true);
    if (!claims) return;

    const now = this.options.now();
    if (claims.exp * 1000 > now) {
      await this.revokedTokenRepository
        .createQueryBuilder()
        .insert()
        .into(RevokedToken)
        .values({
          jti: claims.jti,
          identityId: Number(claims.sub),
          expiresAt: new Date(claims.exp * 1000),
        })
        .orIgnore()
        .execute();
      this.logger.log(`Revoked token ${claims.jti} of identity ${claims.sub}`);
    }

    await this.purgeExpired(now);
  }

  async purgeExpired(now: number = this.options.now()): Promise<number> {
    const result = await this.revokedTokenRepository.delete({
      expiresAt: LessThanOrEqual(new Date(now)),
    });
    return result.affected ?? 0;
  }

  // null means malformed; an expired token throws unless ignoreExpiration is set
  private verify(token: string, ignoreExpiration: boolean): TokenClaims | null {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        issuer: this.options.issuer,
        clockTimestamp: this.nowSeconds(),
        ignoreExpiration,
      });
    } catch (error) {
      if (error instanceof TokenExpiredError) throw new InvalidTokenError('expired');
      if (error instanceof JsonWebTokenError) return null;
      throw error;
    }

    const parsed = claimsSchema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }

  private nowSeconds(): number {
    return Math.floor(this.options.now() / 1000);
  }
}

function toSessionClaims(claims: TokenClaims): SessionClaims {
  return {
    identityId: Number(claims.sub),
    tokenId: claims.jti,
    issuedAt: new Date(claims.iat * 1000),
    expiresAt: new Date(claims.exp * 1000),
  };
}
