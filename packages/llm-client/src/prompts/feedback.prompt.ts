import { Criterion } from '@rephrase/core';
import { RequestKind } from '../presets';
import { createGenerationRequest, type GenerationRequest } from './generation-request';

const CRITERIA = Object.values(Criterion).join(', ');

export const FEEDBACK_PROMPT_TEMPLATE = `Evaluate this Vietnamese-to-English translation against the IELTS Writing criteria.

Vietnamese original: "{{sourceText}}"
Learner's translation: "{{candidateTranslation}}"
Target Band: {{targetBand}}

Score every band on the 0-9 scale using only whole or half bands (.0 or .5):
- Band 5.0-5.5: Limited - basic vocabulary, frequent errors, simple sentences
- Band 6.0-6.5: Competent - adequate vocabulary, some errors, a mix of simple and complex forms
- Band 7.0-7.5: Good - wide vocabulary, good control, varied structures
- Band 8.0-8.5: Very Good - wide range, rare errors, sophisticated structures
- Band 9.0: Expert - full flexibility, complete accuracy, natural expression

Use these criterion keys: ${CRITERIA}.

Return ONLY valid JSON (no markdown, no backticks):
{
  "overallBand": 6.5,
  "criteria": {
    "lexicalResource": { "band": 6.0, "comment": "vocabulary range and accuracy" },
    "grammaticalRange": { "band": 6.5, "comment": "grammar variety and accuracy" },
    "coherence": { "band": 7.0, "comment": "flow and logical connection" },
    "taskAchievement": { "band": 6.5, "comment": "meaning preserved and complete" }
  },
  "goodPoints": ["point 1", "point 2"],
  "issues": [
    { "word": "tired", "criterion": "lexicalResource", "reason": "too basic for Band 7+" }
  ],
  "upgrades": [
    {
      "original": "tired",
      "context": "I feel tired",
      "alternatives": [
        {
          "word": "drained",
          "pos": "adj",
          "meaning": "extremely tired, with no energy left",
          "example": "I felt completely drained after the meeting.",
          "meaningVi": "kiệt sức",
          "bandLevel": "7.0+"
        }
      ]
    }
  ],
  "improvedSentence": "a Band 7.5+ version that keeps the original meaning",
  "explanation": "a short explanation in Vietnamese of the key improvements"
}

Be encouraging but hold to IELTS standards. Focus on vocabulary and grammar upgrades.`;

export function buildFeedbackRequest(
  sourceText: string,
  candidateTranslation: string,
  targetBand: string
): GenerationRequest {
  return createGenerationRequest(RequestKind.EVALUATE, FEEDBACK_PROMPT_TEMPLATE, {
    sourceText,
    candidateTranslation,
    targetBand,
  });
}
