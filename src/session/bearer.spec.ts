import { extractBearerToken } from './bearer';

describe('extractBearerToken', () => {
  it.each([
    ['Bearer abc.def.ghi', 'abc.def.ghi'],
    ['bearer abc', 'abc'],
    ['Bearer   padded  ', 'padded'],
  ])('reads %p', (header, token) => {
    expect(extractBearerToken(header)).toBe(token);
  });

  it.each([undefined, '', 'Basic dXNlcjpwYXNz', 'Bearer', 'Bearer    '])('returns null for %p', (header) => {
    expect(extractBearerToken(header)).toBeNull();
  });
});
