import { RequestKind } from '../presets';
import { createGenerationRequest, type GenerationRequest } from './generation-request';

export const SENTENCE_PROMPT_TEMPLATE = `Generate a Vietnamese sentence for English translation practice.

Topic: {{topic}}
Target IELTS Band: {{targetBand}}

Requirements:
- A natural sentence a native Vietnamese speaker would actually say
- Complexity suited to a learner aiming for Band {{targetBand}}
- Leaves room for interesting vocabulary upgrades in the English translation
- Uses an idiomatic expression or common phrase where it fits
- Varies sentence structure from one request to the next{{history}}

Return ONLY valid JSON (no markdown, no backticks):
{
  "vietnamese": "...",
  "topic": "{{topic}}",
  "targetBand": "{{targetBand}}",
  "hint": "a short grammar or vocabulary hint in Vietnamese",
  "keyStructures": ["structure1", "structure2"]
}`;

export function historyClause(history: readonly string[]): string {
  if (history.length === 0) {
    return '';
  }
  const listed = history.map((sentence) => `- ${sentence}`).join('\n');
  return (
    '\n\nDo NOT repeat any of these recent sentences:\n' +
    `${listed}\n\n` +
    'Write a completely different sentence with new vocabulary and structure.'
  );
}

export function buildSentenceRequest(
  topic: string,
  targetBand: string,
  history: readonly string[] = []
): GenerationRequest {
  return createGenerationRequest(RequestKind.GENERATE, SENTENCE_PROMPT_TEMPLATE, {
    topic,
    targetBand,
    history: historyClause(history),
  });
}
