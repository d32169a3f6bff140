import { z } from 'zod';
import { InvalidInputError } from './errors';
import { ZodValidationPipe } from './zod-validation.pipe';

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(
    z.object({
      name: z.string().trim().min(1),
      tags: z.array(z.string()).default([]),
    }),
  );

  it('returns the parsed value', () => {
    expect(pipe.transform({ name: '  ada ' })).toEqual({ name: 'ada', tags: [] });
  });

  it('throws InvalidInputError listing each problem with its path', () => {
    let thrown: unknown;
    try {
      pipe.transform({ name: '', tags: [1] });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InvalidInputError);
    expect(thrown).toHaveProperty('problems', [
      'name: String must contain at least 1 character(s)',
      'tags.0: Expected string, received number',
    ]);
  });

  it('reports a non-object body without a path', () => {
    expect(() => pipe.transform('text')).toThrow(InvalidInputError);
    try {
      pipe.transform('text');
    } catch (error) {
      expect(error).toHaveProperty('problems', ['Expected object, received string']);
    }
  });
});
