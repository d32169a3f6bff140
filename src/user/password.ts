import * as bcrypt from 'bcryptjs';

export function hashPassword(plain: string, rounds: number): Promise<string> {
  return bcrypt.hash(plain, rounds);
}

export function verifyPassword(plain: string, digest: string): Promise<boolean> {
  return bcrypt.compare(plain, digest);
}
