import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { QueryFailedError } from 'typeorm';

export class InvalidInputError extends BadRequestException {
  constructor(readonly problems: string[]) {
    super({ statusCode: 400, error: 'Bad Request', message: problems });
  }
}

export class DuplicateIdentityError extends ConflictException {
  constructor() {
    super('Username or email is already registered');
  }
}

// Returned for an unknown identity and for a wrong password alike.
export class InvalidCredentialsError extends UnauthorizedException {
  constructor() {
    super('Invalid credentials');
  }
}

export type TokenFailureReason = 'malformed' | 'expired' | 'revoked';

/**
 * Any token validation failure. The reason is kept for logs and tests only;
 * the response body is identical for every reason.
 */
export class InvalidTokenError extends UnauthorizedException {
  constructor(readonly reason: TokenFailureReason) {
    super('Invalid token');
  }
}

export class ContactNotFoundError extends NotFoundException {
  constructor(id: number) {
    super(`Contact ${id} not found`);
  }
}

export class DuplicateContactError extends ConflictException {
  constructor(email: string) {
    super(`A contact with email ${email} already exists`);
  }
}

const UNIQUE_VIOLATION_CODES = ['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY'];

// Postgres reports 23505; better-sqlite3 reports SQLITE_CONSTRAINT_*.
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
    return false;
  }
  return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.includes(driverError.code);
}
