import { z } from 'zod';

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullish(),
    code: z.union([z.string(), z.number()]).nullish(),
  }),
});

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

/**
 * Extracts `error.message` from a provider error body, if it has one.
 */
export function decodeErrorEnvelope(body: Buffer | string): string | undefined {
  const text = typeof body === 'string' ? body : body.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  const result = ErrorEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    return undefined;
  }
  const message = result.data.error.message.trim();
  return message.length > 0 ? message : undefined;
}
