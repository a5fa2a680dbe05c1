import type { Context } from 'hono';
import type { ZodError } from 'zod';

/**
 * zValidator hook: report the first issue in the admin API error shape
 */
export function validationHook(
  result: { success: true } | { success: false; error: ZodError },
  c: Context
) {
  if (!result.success) {
    const issue = result.error.issues[0];
    const message = issue ? `${issue.path.join('.') || 'query'}: ${issue.message}` : 'Invalid request';
    return c.json({ error: 'invalid_request', message }, 400);
  }
  return undefined;
}
