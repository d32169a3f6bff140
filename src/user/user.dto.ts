import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

const username = z
  .string()
  .trim()
  .min(3)
  .max(32)
  .regex(/^[A-Za-z0-9_.-]+$/, 'may only contain letters, digits, "_", "." and "-"');

const email = z.string().trim().toLowerCase().email();

// bcrypt reads at most 72 bytes of the password
const password = z
  .string()
  .min(6)
  .max(72)
  .refine((value) => Buffer.byteLength(value, 'utf8') <= 72, 'must be at most 72 bytes');

export const registerSchema = z.object({ username, email, password });

export const loginSchema = z.object({
  usernameOrEmail: z.string().trim().min(1),
  password: z.string().min(1),
});

export const updateProfileSchema = z
  .object({
    username: username.optional(),
    email: email.optional(),
    password: password.optional(),
    currentPassword: z.string().min(1).optional(),
  })
  .refine((dto) => dto.username !== undefined || dto.email !== undefined || dto.password !== undefined, {
    message: 'at least one of username, email or password is required',
  })
  .refine((dto) => dto.password === undefined || dto.currentPassword !== undefined, {
    message: 'is required to change the password',
    path: ['currentPassword'],
  });

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;

// The classes below only describe the bodies for Swagger; the zod schemas validate them.

export class RegisterDto implements RegisterInput {
  @ApiProperty({ example: 'alice' })
  username!: string;

  @ApiProperty({ example: 'a@x.com' })
  email!: string;

  @ApiProperty({ example: 'Secr3t!', minLength: 6, maxLength: 72 })
  password!: string;
}

export class LoginDto implements LoginInput {
  @ApiProperty({ description: 'Username or email', example: 'alice' })
  usernameOrEmail!: string;

  @ApiProperty({ example: 'Secr3t!' })
  password!: string;
}

export class UpdateProfileDto implements UpdateProfileInput {
  @ApiPropertyOptional()
  username?: string;

  @ApiPropertyOptional()
  email?: string;

  @ApiPropertyOptional({ description: 'New password' })
  password?: string;

  @ApiPropertyOptional({ description: 'Required together with password' })
  currentPassword?: string;
}

export interface ProfileView {
  id: number;
  username: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
}
