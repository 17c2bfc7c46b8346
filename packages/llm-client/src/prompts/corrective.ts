export const CORRECTIVE_INSTRUCTION =
  'Your previous reply could not be parsed as the requested JSON. ' +
  'Answer again with exactly one valid JSON object in the format below, ' +
  'without markdown fences or any other text.';

export function withCorrection(prompt: string): string {
  return `${CORRECTIVE_INSTRUCTION}\n\n${prompt}`;
}
