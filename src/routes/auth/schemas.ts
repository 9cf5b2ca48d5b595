import { z } from 'zod';
import type { ZodError } from 'zod';
import { AuthError } from '../../errors/auth-error.js';
import { formatZodIssues } from '../../middleware/error-handler.js';

export const loginSchema = z.object({
  email: z.string({ required_error: 'Email is required' }),
  password: z.string({ required_error: 'Password is required' }),
});

export const registerSchema = z.object({
  firstName: z.string().trim().min(1, 'First name is required').max(100),
  lastName: z.string().trim().min(1, 'Last name is required').max(100),
  email: z.string({ required_error: 'Email is required' }).max(254),
  password: z.string({ required_error: 'Password is required' }).max(128),
});

export const refreshTokenSchema = z.object({
  refreshToken: z.string({ required_error: 'Refresh token is required' }),
});

export const logoutSchema = z.object({
  refreshToken: z.string().optional(),
});

/**
 * zValidator hook: render schema failures as `validation_failed`
 */
export function rejectInvalid(
  result: { success: true } | { success: false; error: ZodError }
): void {
  if (!result.success) {
    throw AuthError.validationFailed(formatZodIssues(result.error));
  }
}
