import type { RequestKind } from '../presets';

export interface GenerationRequest {
  readonly requestKind: RequestKind;
  readonly parameters: Readonly<Record<string, string>>;
  readonly promptTemplate: string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

export function createGenerationRequest(
  requestKind: RequestKind,
  promptTemplate: string,
  parameters: Record<string, string>
): GenerationRequest {
  return Object.freeze({
    requestKind,
    promptTemplate,
    parameters: Object.freeze({ ...parameters }),
  });
}

/**
 * Fills `{{name}}` placeholders from the request parameters in a single pass.
 * Placeholders without a parameter are left as they are.
 */
export function renderPrompt(request: GenerationRequest): string {
  return request.promptTemplate.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(request.parameters, name)
      ? request.parameters[name]
      : placeholder
  );
}
