import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';

export const IntentRequestSchema = z.object({
  intent: z.string().trim().min(1, 'intent is required'),
  args: z.record(z.unknown()).optional(),
});

export type IntentRequest = z.infer<typeof IntentRequestSchema>;

export const SessionIdSchema = z
  .string()
  .trim()
  .min(1, 'sessionId is required')
  .max(128, 'sessionId is too long');

export function parseIntentRequest(body: unknown): IntentRequest {
  const parsed = IntentRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((i) => i.path.join('.') || 'body'))];
    throw new ValidationError(parsed.error.issues.map((i) => i.message).join('; '), fields);
  }
  return parsed.data;
}

export function parseSessionId(raw: unknown): string {
  const parsed = SessionIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid sessionId', ['sessionId']);
  }
  return parsed.data;
}
