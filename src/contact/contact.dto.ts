import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

const name = z.string().trim().min(1).max(80);
const email = z.string().trim().toLowerCase().email();

// ids are int4 columns under postgres
export const contactIdSchema = z.coerce.number().int().positive().max(2147483647);

export const createContactSchema = z.object({
  firstName: name,
  lastName: name,
  email,
});

export const updateContactSchema = createContactSchema
  .partial()
  .refine((dto) => Object.values(dto).some((value) => value !== undefined), {
    message: 'at least one of firstName, lastName or email is required',
  });

export type CreateContactInput = z.infer<typeof createContactSchema>;
export type UpdateContactInput = z.infer<typeof updateContactSchema>;

export class CreateContactDto implements CreateContactInput {
  @ApiProperty({ example: 'Ada' })
  firstName!: string;

  @ApiProperty({ example: 'Lovelace' })
  lastName!: string;

  @ApiProperty({ example: 'ada@example.com' })
  email!: string;
}

export class UpdateContactDto implements UpdateContactInput {
  @ApiPropertyOptional()
  firstName?: string;

  @ApiPropertyOptional()
  lastName?: string;

  @ApiPropertyOptional()
  email?: string;
}
