import { registerSchema, updateProfileSchema } from './user.dto';

describe('user schemas', () => {
  const alice = { username: 'alice', email: 'a@x.com' };

  it('accepts a multi-byte password of exactly 72 bytes', () => {
    expect(registerSchema.safeParse({ ...alice, password: 'é'.repeat(36) }).success).toBe(true);
  });

  it('rejects a password of 40 characters but 80 bytes', () => {
    const result = registerSchema.safeParse({ ...alice, password: 'é'.repeat(40) });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual(['must be at most 72 bytes']);
    }
  });

  it('applies the byte limit to a password change', () => {
    const result = updateProfileSchema.safeParse({ password: 'é'.repeat(40), currentPassword: 'Secr3t!' });

    expect(result.success).toBe(false);
  });
});
