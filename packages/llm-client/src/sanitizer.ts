const LEADING_FENCE = /^```[a-z0-9_-]*[ \t]*\r?\n?/i;
const TRAILING_FENCE = /\r?\n?```$/;

/**
 * Strips markdown code fences and surrounding prose from a model reply that should
 * contain one JSON object. Never throws; applying it twice gives the same result.
 */
export function cleanJsonResponse(raw: string): string {
  let text = raw.trim();

  // Replies sometimes stack fences; strip until none is left at either end.
  let previous: string;
  do {
    previous = text;
    text = text.replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
  } while (text !== previous);

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    text = text.slice(start, end + 1);
  }

  return text.trim();
}
