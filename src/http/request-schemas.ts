import { z } from 'zod';
import { ACTIVATION_SECRET_LENGTH } from '../core/account-state-machine.js';
import { RequestValidationError } from '../utils/errors.js';

export const CredentialsBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(6).max(20),
});

export const ActivationBodySchema = z.object({
  email: z.string().email(),
  token: z.string().length(ACTIVATION_SECRET_LENGTH),
});

export type CredentialsBody = z.infer<typeof CredentialsBodySchema>;
export type ActivationBody = z.infer<typeof ActivationBodySchema>;

/**
 * @throws {RequestValidationError} Listing the offending fields
 */
export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError('Request body is invalid', {
      fields: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }
  return result.data;
}
