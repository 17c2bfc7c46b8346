import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { createTutorClient } from '../src/factory';
import { parseEnv } from '../src/config/env';
import { HttpError, MissingCredentialError } from '../src/errors';
import { loggerOptions } from '../src/utils/logger';
import {
  ScriptedTransport,
  completion,
  httpFailure,
  sentenceJson,
  silentLogger,
} from './helpers/scripted-transport';

describe('createTutorClient', () => {
  it('should send requests with the configured model, endpoint and timeout', async () => {
    const env = parseEnv({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_BASE_URL: 'https://llm.test/v1/chat/completions',
      LLM_TIMEOUT_MS: '1500',
      LOG_LEVEL: 'silent',
    });
    const transport = new ScriptedTransport([completion(sentenceJson('Tôi thích đọc sách.'))]);
    const client = createTutorClient({ env, transport, logger: silentLogger });

    const sentence = await client.generate('Education', '7.0');

    expect(sentence.vietnamese).toBe('Tôi thích đọc sách.');
    expect(transport.requests[0].url).toBe('https://llm.test/v1/chat/completions');
    expect(transport.requests[0].timeoutMs).toBe(1500);
    expect(transport.requests[0].headers.Authorization).toBe('Bearer test-secret');
    expect(transport.body(0).model).toBe('gpt-4o-mini');
    expect(transport.body(0).temperature).toBe(0.9);
  });

  it('should apply the configured retry budget', async () => {
    const env = parseEnv({ OPENAI_API_KEY: 'test-secret', LLM_MAX_RETRIES: '0', LOG_LEVEL: 'silent' });
    const transport = new ScriptedTransport([httpFailure(500)]);
    const client = createTutorClient({ env, transport, logger: silentLogger });

    await expect(client.generate('Education', '7.0')).rejects.toBeInstanceOf(HttpError);
    expect(transport.callCount).toBe(1);
  });

  it('should build a client that reports a missing key per request', async () => {
    const transport = new ScriptedTransport();
    const client = createTutorClient({
      env: parseEnv({ LOG_LEVEL: 'silent' }),
      transport,
      logger: silentLogger,
    });

    await expect(client.generate('Education', '7.0')).rejects.toBeInstanceOf(MissingCredentialError);
    expect(transport.callCount).toBe(0);
  });

  it('should log at the configured LOG_LEVEL', async () => {
    const lines: Array<Record<string, unknown>> = [];
    const parent = pino(
      { ...loggerOptions, transport: undefined, level: 'debug' },
      {
        write(line: string) {
          lines.push(JSON.parse(line));
        },
      }
    );
    const env = parseEnv({ OPENAI_API_KEY: 'test-secret', LOG_LEVEL: 'error' });
    const transport = new ScriptedTransport([httpFailure(401, 'Incorrect API key provided')]);
    const client = createTutorClient({ env, transport, logger: parent });

    await expect(client.generate('Education', '7.0')).rejects.toBeInstanceOf(HttpError);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'error',
      component: 'structured-request-client',
      msg: 'generate failed: Invalid API key: Incorrect API key provided',
    });
  });
});
