import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken, TypeOrmModule } from '@nestjs/typeorm';
import jwt from 'jsonwebtoken';
import { Repository } from 'typeorm';
import { InvalidTokenError, TokenFailureReason } from '../core/errors';
import { RevokedToken } from './revoked-token.entity';
import { SESSION_OPTIONS, SessionOptions } from './session.options';
import { SessionService } from './session.service';

const secret = 'test-secret-test-secret-test-secret';
const issuer = 'contact-book-test';
const start = Date.UTC(2026, 0, 1, 12, 0, 0);

async function expectTokenFailure(promise: Promise<unknown>, reason: TokenFailureReason) {
  const error: unknown = await promise.then(
    () => undefined,
    (rejected: unknown) => rejected,
  );
  expect(error).toBeInstanceOf(InvalidTokenError);
  expect(error).toHaveProperty('reason', reason);
}

describe('SessionService', () => {
  let moduleRef: TestingModule;
  let service: SessionService;
  let revoked: Repository<RevokedToken>;
  let now: number;

  beforeEach(async () => {
    now = start;
    const options: SessionOptions = { secret, issuer, ttlSeconds: 3600, now: () => now };

    moduleRef = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [RevokedToken],
          synchronize: true,
        }),
        TypeOrmModule.forFeature([RevokedToken]),
      ],
      providers: [SessionService, { provide: SESSION_OPTIONS, useValue: options }],
    }).compile();

    service = moduleRef.get(SessionService);
    revoked = moduleRef.get(getRepositoryToken(RevokedToken));
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('issue', () => {
    it('embeds identity, issue time and expiry', () => {
      const issued = service.issue(7, 120);

      expect(issued.identityId).toBe(7);
      expect(issued.issuedAt).toEqual(new Date(start));
      expect(issued.expiresAt).toEqual(new Date(start + 120_000));

      const decoded = jwt.decode(issued.token);
      expect(decoded).toMatchObject({
        sub: '7',
        jti: issued.tokenId,
        iat: start / 1000,
        exp: start / 1000 + 120,
        iss: issuer,
      });
    });

    it('uses the configured lifetime by default', () => {
      const issued = service.issue(1);
      expect(issued.expiresAt.getTime() - issued.issuedAt.getTime()).toBe(3600_000);
    });

    it('gives every token its own id', () => {
      expect(service.issue(1).tokenId).not.toBe(service.issue(1).tokenId);
    });

    it.each([0, -5, 1.5])('rejects a ttl of %p', (ttl) => {
      expect(() => service.issue(1, ttl)).toThrow(RangeError);
    });
  });

  describe('validate', () => {
    it('returns the identity of a fresh token', async () => {
      const issued = service.issue(42, 60);

      await expect(service.validate(issued.token)).resolves.toEqual({
        identityId: 42,
        tokenId: issued.tokenId,
        issuedAt: issued.issuedAt,
        expiresAt: issued.expiresAt,
      });
    });

    it('accepts a token one second before expiry', async () => {
      const issued = service.issue(42, 60);
      now = start + 59_000;

      await expect(service.validate(issued.token)).resolves.toMatchObject({ identityId: 42 });
    });

    it('reports expired once the ttl has elapsed', async () => {
      const issued = service.issue(42, 60);
      now = start + 60_000;

      await expectTokenFailure(service.validate(issued.token), 'expired');
    });

    it('reports malformed for garbage', async () => {
      await expectTokenFailure(service.validate('not-a-token'), 'malformed');
    });

    it('reports malformed for a tampered payload', async () => {
      const [header, , signature] = service.issue(1, 60).token.split('.');
      const forged = Buffer.from(
        JSON.stringify({ sub: '2', jti: '00000000-0000-4000-8000-000000000000', iat: start / 1000, exp: start / 1000 + 60, iss: issuer }),
      ).toString('base64url');

      await expectTokenFailure(service.validate(`${header}.${forged}.${signature}`), 'malformed');
    });

    it('reports malformed for a token signed with another secret', async () => {
      const token = jwt.sign(
        { sub: '1', jti: '00000000-0000-4000-8000-000000000000', iat: start / 1000, exp: start / 1000 + 60 },
        'another-secret-another-secret-another',
        { issuer },
      );

      await expectTokenFailure(service.validate(token), 'malformed');
    });

    it('reports malformed for a token from another issuer', async () => {
      const token = jwt.sign(
        { sub: '1', jti: '00000000-0000-4000-8000-000000000000', iat: start / 1000, exp: start / 1000 + 60 },
        secret,
        { issuer: 'someone-else' },
      );

      await expectTokenFailure(service.validate(token), 'malformed');
    });

    it('reports malformed when claims are missing', async () => {
      const token = jwt.sign({ sub: '1', iat: start / 1000, exp: start / 1000 + 60 }, secret, { issuer });

      await expectTokenFailure(service.validate(token), 'malformed');
    });
  });

  describe('invalidate', () => {
    it('revokes the token', async () => {
      const issued = service.issue(3, 60);

      await service.invalidate(issued.token);

      await expectTokenFailure(service.validate(issued.token), 'revoked');
      const rows = await revoked.find();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({ jti: issued.tokenId, identityId: 3 });
      expect(rows[0].expiresAt).toEqual(issued.expiresAt);
    });

    it('is idempotent', async () => {
      const issued = service.issue(3, 60);

      await service.invalidate(issued.token);
      await expect(service.invalidate(issued.token)).resolves.toBeUndefined();

      await expect(revoked.count()).resolves.toBe(1);
      await expectTokenFailure(service.validate(issued.token), 'revoked');
    });

    it('leaves other tokens of the same identity valid', async () => {
      const first = service.issue(3, 60);
      const second = service.issue(3, 60);

      await service.invalidate(first.token);

      await expect(service.validate(second.token)).resolves.toMatchObject({ identityId: 3 });
    });

    it('ignores malformed tokens', async () => {
      await expect(service.invalidate('not-a-token')).resolves.toBeUndefined();
      await expect(revoked.count()).resolves.toBe(0);
    });

    it('does not record tokens that already expired', async () => {
      const issued = service.issue(3, 60);
      now = start + 61_000;

      await service.invalidate(issued.token);

      await expect(revoked.count()).resolves.toBe(0);
      await expectTokenFailure(service.validate(issued.token), 'expired');
    });

    it('keeps a revoked token terminal after it expires', async () => {
      const issued = service.issue(3, 60);
      await service.invalidate(issued.token);
      now = start + 120_000;

      await expectTokenFailure(service.validate(issued.token), 'expired');
    });

    it('purges entries whose tokens have expired', async () => {
      const shortLived = service.issue(3, 60);
      await service.invalidate(shortLived.token);

      now = start + 120_000;
      const later = service.issue(3, 60);
      await service.invalidate(later.token);

      const rows = await revoked.find();
      expect(rows.map((row) => row.jti)).toEqual([later.tokenId]);
    });
  });
});
