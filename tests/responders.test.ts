import { describe, it, expect, vi, afterEach } from 'vitest';
import { MockResponder, candidateReplies } from '../src/providers/mock-responder.js';
import { FALLBACK_REPLY, GuardedResponder } from '../src/providers/guarded-responder.js';
import { OpenAIResponder } from '../src/providers/openai-provider.js';
import { createResponder } from '../src/providers/provider-factory.js';
import { ResponderError } from '../src/core/errors.js';
import type { ResponseGenerator } from '../src/types/provider.js';
import type { ResponderConfig } from '../src/types/config.js';
import { createTestConfig } from './helpers.js';

function stub(generate: ResponseGenerator['generate']): ResponseGenerator {
  return { name: 'stub', generate };
}

function responderConfig(overrides: Record<string, unknown>): ResponderConfig {
  return createTestConfig({ responder: overrides }).responder;
}

describe('candidateReplies', () => {
  it('matches greetings as whole words', () => {
    expect(candidateReplies('hello there')[0]).toBe('你好！今天有什么可以帮你的？');
    expect(candidateReplies('this is fine')[0]).toBe('我理解你在说「this is fine」，可以再多讲一些背景吗？');
  });

  it('matches Chinese keywords anywhere in the text', () => {
    expect(candidateReplies('谢谢你')[0]).toBe('不客气！还有其他需要帮忙的吗？');
  });

  it('echoes the question without its trailing mark', () => {
    expect(candidateReplies('What is TypeScript?')[0]).toBe('关于「What is TypeScript」这个问题，我来帮你梳理一下……');
  });

  it('shortens long messages in the fallback', () => {
    expect(candidateReplies('a'.repeat(60))[0]).toBe(`我理解你在说「${'a'.repeat(50)}…」，可以再多讲一些背景吗？`);
  });
});

describe('MockResponder', () => {
  it('uses the injected pick on the trimmed message', async () => {
    const responder = new MockResponder({ latencyMs: 0, pick: () => 1 });
    expect(await responder.generate([], '  hey  ')).toBe('嗨！想了解些什么？');
  });

  it('stops waiting when aborted', async () => {
    const responder = new MockResponder({ latencyMs: 10_000 });
    const controller = new AbortController();
    const pending = responder.generate([], 'hi', controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow();
  });
});

describe('GuardedResponder', () => {
  const options = { timeoutMs: 50, maxConcurrent: 2 };

  it('trims a successful reply', async () => {
    const guarded = new GuardedResponder(stub(async () => '  ok  '), options);
    expect(guarded.name).toBe('guarded(stub)');
    expect(await guarded.generate([], 'x')).toBe('ok');
  });

  it('falls back on errors and empty replies', async () => {
    const failing = new GuardedResponder(stub(async () => {
      throw new Error('upstream down');
    }), options);
    const empty = new GuardedResponder(stub(async () => '   '), options);

    expect(await failing.generate([], 'x')).toBe(FALLBACK_REPLY);
    expect(await empty.generate([], 'x')).toBe(FALLBACK_REPLY);
  });

  it('falls back when the reply takes too long', async () => {
    const seen: AbortSignal[] = [];
    const hanging = new GuardedResponder(stub((_history, _message, signal) => {
      if (signal) seen.push(signal);
      return new Promise<string>(() => undefined);
    }), options);

    expect(await hanging.generate([], 'x')).toBe(FALLBACK_REPLY);
    expect(seen[0]?.aborted).toBe(true);
  });

  it('falls back when the caller aborts', async () => {
    const guarded = new GuardedResponder(stub(() => new Promise<string>(() => undefined)), { timeoutMs: 10_000, maxConcurrent: 1 });
    const controller = new AbortController();
    const pending = guarded.generate([], 'x', controller.signal);
    controller.abort();
    expect(await pending).toBe(FALLBACK_REPLY);
  });

  it('limits concurrent calls', async () => {
    let running = 0;
    let peak = 0;
    const guarded = new GuardedResponder(stub(async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return 'done';
    }), { timeoutMs: 1000, maxConcurrent: 1 });

    const replies = await Promise.all([guarded.generate([], 'a'), guarded.generate([], 'b'), guarded.generate([], 'c')]);

    expect(replies).toEqual(['done', 'done', 'done']);
    expect(peak).toBe(1);
  });

  it('counts time spent waiting for a slot against the timeout', async () => {
    const guarded = new GuardedResponder(stub(async () => {
      await new Promise((resolve) => setTimeout(resolve, 150));
      return 'slow';
    }), { timeoutMs: 100, maxConcurrent: 1 });

    const started = Date.now();
    const replies = await Promise.all([1, 2, 3, 4].map((i) => guarded.generate([], `m${i}`)));
    const elapsed = Date.now() - started;

    expect(replies).toEqual([FALLBACK_REPLY, FALLBACK_REPLY, FALLBACK_REPLY, FALLBACK_REPLY]);
    expect(elapsed).toBeLessThan(200);
  });
});

describe('OpenAIResponder', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function completion(content: string | null): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content }, finish_reason: 'stop' }] }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  it('requires an API key', () => {
    expect(() => new OpenAIResponder(responderConfig({ kind: 'openai' }))).toThrow(ResponderError);
  });

  it('posts the conversation and returns the trimmed content', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => completion('  Sure.  '));
    vi.stubGlobal('fetch', fetchMock);
    const responder = new OpenAIResponder(responderConfig({
      kind: 'openai',
      apiKey: 'test-key',
      apiBase: 'https://llm.example.test/v1/',
      systemPrompt: 'Be brief.',
      model: 'test-model',
    }));

    const reply = await responder.generate(
      [{ role: 'user', content: 'hi' }, { role: 'assistant', content: 'hello' }, { role: 'user', content: 'help' }],
      'help',
    );

    expect(reply).toBe('Sure.');
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('https://llm.example.test/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'help' },
      ],
    });
  });

  it('turns an error status into a ResponderError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', { status: 429, statusText: 'Too Many Requests' })));
    const responder = new OpenAIResponder(responderConfig({ kind: 'openai', apiKey: 'test-key' }));

    await expect(responder.generate([], 'x')).rejects.toThrow('[OpenAIResponder] API 返回错误: 429 Too Many Requests');
  });

  it('returns an empty string for a null content', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => completion(null)));
    const responder = new OpenAIResponder(responderConfig({ kind: 'openai', apiKey: 'test-key' }));

    expect(await responder.generate([], 'x')).toBe('');
  });
});

describe('createResponder', () => {
  it('wraps the configured responder', () => {
    expect(createResponder(responderConfig({ kind: 'mock' })).name).toBe('guarded(mock)');
  });

  it('fails for an openai responder without a key', () => {
    expect(() => createResponder(responderConfig({ kind: 'openai' }))).toThrow(ResponderError);
  });
});
