import { z } from 'zod';
import { validateInput, formatValidationErrors } from './validation.utils.js';
import { GoogleSheetsInvalidArgumentError } from '../errors/index.js';

const schema = z.object({
  role: z.enum(['reader', 'writer']),
  emailAddress: z.string().email().optional(),
});

describe('validateInput', () => {
  it('returns parsed data', () => {
    const result = validateInput(schema, { role: 'reader' });
    expect(result._unsafeUnwrap()).toEqual({ role: 'reader' });
  });

  it('reports a single issue with its path', () => {
    const result = validateInput(schema, { role: 'reader', emailAddress: 'not-an-email' });
    const error = result._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(GoogleSheetsInvalidArgumentError);
    expect(error.message).toBe('emailAddress: Invalid email');
    expect(error.statusCode).toBe(400);
  });

  it('summarizes several issues', () => {
    const result = validateInput(schema, { role: 'owner', emailAddress: 'x' }, { operation: 'share' });
    const error = result._unsafeUnwrapErr();

    expect(error.message).toBe('Invalid input data: Found 2 validation errors');
    expect(error.context?.operation).toBe('share');
    expect(formatValidationErrors(result)).toEqual([
      "role: Invalid enum value. Expected 'reader' | 'writer', received 'owner'",
      'emailAddress: Invalid email',
    ]);
  });

  it('formats nothing for a success', () => {
    expect(formatValidationErrors(validateInput(schema, { role: 'writer' }))).toEqual([]);
  });
});
