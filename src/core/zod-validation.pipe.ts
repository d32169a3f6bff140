import { PipeTransform } from '@nestjs/common';
import { z, ZodTypeAny } from 'zod';
import { InvalidInputError } from './errors';

export class ZodValidationPipe<S extends ZodTypeAny> implements PipeTransform<unknown, z.infer<S>> {
  constructor(private readonly schema: S) {}

  transform(value: unknown): z.infer<S> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new InvalidInputError(
        result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      );
    }
    return result.data;
  }
}
