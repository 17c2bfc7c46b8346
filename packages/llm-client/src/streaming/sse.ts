import { z } from 'zod';

const DATA_PREFIX = 'data:';
const DONE_MARKER = '[DONE]';

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

export type SseEvent = { type: 'delta'; text: string } | { type: 'done' } | { type: 'skip' };

/**
 * Splits a chunked byte or text stream into lines. A line may span chunks and
 * multi-byte characters may be split between them.
 */
export class SseDecoder {
  private readonly decoder = new TextDecoder('utf-8');
  private buffer = '';

  push(chunk: Buffer | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    return this.drain();
  }

  /** Returns whatever is left once the stream has ended. */
  flush(): string[] {
    this.buffer += this.decoder.decode();
    const lines = this.drain();
    if (this.buffer.length > 0) {
      lines.push(this.buffer);
      this.buffer = '';
    }
    return lines;
  }

  private drain(): string[] {
    const lines: string[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      lines.push(this.buffer.slice(0, newline).replace(/\r$/, ''));
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf('\n');
    }
    return lines;
  }
}

export function parseSseLine(line: string): SseEvent {
  if (!line.startsWith(DATA_PREFIX)) {
    return { type: 'skip' };
  }

  const data = line.slice(DATA_PREFIX.length).trim();
  if (data === DONE_MARKER) {
    return { type: 'done' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return { type: 'skip' };
  }

  const result = StreamChunkSchema.safeParse(parsed);
  const text = result.success ? result.data.choices[0].delta.content : undefined;
  return text ? { type: 'delta', text } : { type: 'skip' };
}

/**
 * Yields the text deltas of a chat-completions event stream until `[DONE]` or the
 * end of the body. Lines that are not data lines, and chunks that do not parse,
 * are skipped.
 */
export async function* consumeSse(body: AsyncIterable<Buffer | string>): AsyncGenerator<string> {
  const decoder = new SseDecoder();

  for await (const chunk of body) {
    for (const line of decoder.push(chunk)) {
      const event = parseSseLine(line);
      if (event.type === 'done') return;
      if (event.type === 'delta') yield event.text;
    }
  }

  for (const line of decoder.flush()) {
    const event = parseSseLine(line);
    if (event.type === 'done') return;
    if (event.type === 'delta') yield event.text;
  }
}
