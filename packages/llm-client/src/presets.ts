import { z } from 'zod';
import { validateOrThrow } from '@rephrase/core';

export enum RequestKind {
  GENERATE = 'generate',
  EVALUATE = 'evaluate',
}

export const RequestConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  systemMessage: z.string().min(1).optional(),
  maxTokens: z.number().int().positive(),
  stopSequences: z.array(z.string().min(1)).max(4).optional(),
});

export type RequestConfig = Readonly<z.infer<typeof RequestConfigSchema>>;

export type RequestPresets = Readonly<Record<RequestKind, RequestConfig>>;

function definePreset(config: z.infer<typeof RequestConfigSchema>): RequestConfig {
  return Object.freeze(validateOrThrow(RequestConfigSchema, config));
}

/**
 * Builds the two request configurations used by the tutor. Both are frozen.
 */
export function createRequestPresets(model: string): RequestPresets {
  return Object.freeze({
    [RequestKind.GENERATE]: definePreset({
      model,
      temperature: 0.9,
      systemMessage:
        'You write natural Vietnamese practice sentences. Reply with one JSON object and nothing else.',
      maxTokens: 600,
    }),
    [RequestKind.EVALUATE]: definePreset({
      model,
      temperature: 0.3,
      systemMessage:
        'You are a strict but encouraging IELTS writing examiner. Reply with one JSON object and nothing else.',
      maxTokens: 2000,
    }),
  });
}
