import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';

export const SentencePayloadSchema = z.object({
  vietnamese: z.string().min(1),
  topic: z.string().min(1),
  targetBand: z.string().min(1),
  hint: z.string(),
  keyStructures: z.array(z.string()),
});

export type SentencePayload = z.infer<typeof SentencePayloadSchema>;

export const SentenceSchema = SentencePayloadSchema.extend({
  id: z.string().uuid(),
});

export type Sentence = z.infer<typeof SentenceSchema>;

export function createSentence(payload: SentencePayload): Sentence {
  return { id: uuidv4(), ...payload };
}
