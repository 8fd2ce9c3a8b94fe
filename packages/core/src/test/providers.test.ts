import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  AnthropicVerdictProvider,
  MockVerdictProvider,
  NO_TASK_MESSAGE,
  OpenAIVerdictProvider,
  createVerdictProvider,
  extractJson,
  parsePlannedTasks,
  parseVerdictResponse,
} from '../providers';
import { keywords } from '../providers/mock';
import type { ActivityEvent, Task } from '../types';

const task: Task = {
  id: 1,
  title: 'Write parser',
  description: '',
  status: 'in_progress',
  estimatedDuration: '',
  position: 1,
  createdAt: '2026-03-10T09:00:00.000Z',
  updatedAt: '2026-03-10T09:00:00.000Z',
};

function event(source: string, content = ''): ActivityEvent {
  return { kind: 'modified', source, content, timestamp: '2026-03-10T09:01:00.000Z' };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('parseVerdictResponse', () => {
  it('reads a bare JSON reply', () => {
    expect(parseVerdictResponse('{"verdict":"Distracted","message":"Hey, back to work"}'))
      .toEqual({ verdict: 'Distracted', message: 'Hey, back to work' });
  });

  it('reads a fenced JSON reply', () => {
    const reply = 'Here you go:\n```json\n{"verdict": "Idle", "message": "Wake up", "reasoning": "nothing"}\n```';
    expect(parseVerdictResponse(reply)).toEqual({ verdict: 'Idle', message: 'Wake up' });
  });

  it('falls back to On Track with the raw text', () => {
    expect(parseVerdictResponse('  You seem fine to me.  ')).toEqual({ verdict: 'On Track', message: 'You seem fine to me.' });
  });

  it('truncates long prose to 200 characters', () => {
    expect(parseVerdictResponse('x'.repeat(300)).message).toBe('x'.repeat(200));
  });

  it('treats an unknown verdict as prose', () => {
    const reply = '{"verdict":"Sleepy","message":"zz"}';
    expect(parseVerdictResponse(reply)).toEqual({ verdict: 'On Track', message: reply });
  });

  it('fills in a missing message', () => {
    expect(parseVerdictResponse('{"verdict":"On Track"}')).toEqual({ verdict: 'On Track', message: 'No message' });
  });
});

describe('extractJson', () => {
  it('strips an unlabelled fence', () => {
    expect(extractJson('```\n[1, 2]\n```')).toBe('[1, 2]');
  });
});

describe('parsePlannedTasks', () => {
  it('reads both duration spellings and skips untitled items', () => {
    const reply = JSON.stringify({
      tasks: [
        { title: 'Set up repo', description: 'git init', estimated_duration: '15 min' },
        { title: 'Write lexer', estimatedDuration: '25 min' },
        { description: 'no title' },
        { title: 'Docs' },
      ],
    });
    expect(parsePlannedTasks(reply)).toEqual([
      { title: 'Set up repo', description: 'git init', estimatedDuration: '15 min' },
      { title: 'Write lexer', description: '', estimatedDuration: '25 min' },
      { title: 'Docs', description: '', estimatedDuration: '30 min' },
    ]);
  });

  it('returns [] for prose', () => {
    expect(parsePlannedTasks('Sorry, I cannot help with that.')).toEqual([]);
  });
});

describe('OpenAIVerdictProvider', () => {
  it('posts a chat completion and parses the verdict', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({
      choices: [{ message: { content: '{"verdict":"Distracted","message":"Focus!"}' } }],
    }));
    const provider = new OpenAIVerdictProvider({ apiKey: 'test-key' });

    expect(await provider.classify(task, [event('reddit.html')])).toEqual({ verdict: 'Distracted', message: 'Focus!' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe('gpt-4o');
    expect(body.messages[0].content).toContain('Title: Write parser');
  });

  it('does not call out without an API key', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({}));
    const result = await new OpenAIVerdictProvider({ apiKey: null }).classify(task, []);

    expect(result.verdict).toBe('On Track');
    expect(result.message).toContain('OPENAI_API_KEY');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('turns an HTTP error into On Track', async () => {
    stubFetch(async () => new Response('rate limited', { status: 429 }));
    const result = await new OpenAIVerdictProvider({ apiKey: 'test-key' }).classify(task, []);

    expect(result).toEqual({ verdict: 'On Track', message: 'Error analyzing activity: HTTP 429: rate limited' });
  });

  it('turns a timeout into On Track', async () => {
    stubFetch(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });
    const result = await new OpenAIVerdictProvider({ apiKey: 'test-key', timeoutMs: 10 }).classify(task, []);

    expect(result).toEqual({ verdict: 'On Track', message: 'Error analyzing activity: The operation was aborted due to timeout' });
  });

  it('answers Idle without calling out when no task is active', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({}));
    expect(await new OpenAIVerdictProvider({ apiKey: 'test-key' }).classify(null, []))
      .toEqual({ verdict: 'Idle', message: NO_TASK_MESSAGE });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('plans tasks from the reply', async () => {
    stubFetch(async () => jsonResponse({
      choices: [{ message: { content: '```json\n{"tasks":[{"title":"Set up repo","description":"","estimated_duration":"15 min"}]}\n```' } }],
    }));
    expect(await new OpenAIVerdictProvider({ apiKey: 'test-key' }).planTasks('A CLI todo app'))
      .toEqual([{ title: 'Set up repo', description: '', estimatedDuration: '15 min' }]);
  });

  it('plans nothing when the request fails', async () => {
    stubFetch(async () => new Response('boom', { status: 500 }));
    expect(await new OpenAIVerdictProvider({ apiKey: 'test-key' }).planTasks('A CLI todo app')).toEqual([]);
  });
});

describe('AnthropicVerdictProvider', () => {
  it('posts a message and reads the first text block', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({
      content: [{ type: 'text', text: '```json\n{"verdict":"Idle","message":"Wake up"}\n```' }],
    }));
    const provider = new AnthropicVerdictProvider({ apiKey: 'test-key', baseUrl: 'http://localhost:9999/v1/' });

    expect(await provider.classify(task, [])).toEqual({ verdict: 'Idle', message: 'Wake up' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:9999/v1/messages');
    expect(init?.headers).toMatchObject({ 'x-api-key': 'test-key', 'anthropic-version': '2023-06-01' });
  });

  it('reports an unexpected response shape', async () => {
    stubFetch(async () => jsonResponse({ content: [] }));
    const result = await new AnthropicVerdictProvider({ apiKey: 'test-key' }).classify(task, []);
    expect(result).toEqual({ verdict: 'On Track', message: 'Error analyzing activity: Unexpected response shape from Anthropic' });
  });
});

describe('MockVerdictProvider', () => {
  const mock = new MockVerdictProvider();

  it('extracts keywords without stopwords or short words', () => {
    expect(keywords('Write the parser with tests')).toEqual(['write', 'parser', 'tests']);
  });

  it('is on track when activity mentions the task', async () => {
    expect(await mock.classify(task, [event('parser.py', 'def parse():')]))
      .toEqual({ verdict: 'On Track', message: 'Nice, editing parser.py! Keep going on "Write parser".' });
  });

  it('is distracted by unrelated activity', async () => {
    expect(await mock.classify(task, [event('notes/recipes.md', 'pancakes')]))
      .toEqual({ verdict: 'Distracted', message: 'Wait, why notes/recipes.md? We\'re supposed to be on "Write parser". 🤨' });
  });

  it('is idle without activity', async () => {
    expect((await mock.classify(task, [])).verdict).toBe('Idle');
  });

  it('plans five tasks for a description and none for a blank one', async () => {
    expect(await mock.planTasks('A CLI todo app')).toHaveLength(5);
    expect(await mock.planTasks('  ')).toEqual([]);
  });
});

describe('createVerdictProvider', () => {
  const base = { apiKey: 'test-key', model: null, baseUrl: null, timeoutMs: 1000 };

  it('builds the configured backend', () => {
    expect(createVerdictProvider({ ...base, name: 'openai' }).name).toBe('OpenAI (gpt-4o)');
    expect(createVerdictProvider({ ...base, name: 'anthropic', model: 'claude-test' }).name).toBe('Anthropic (claude-test)');
    expect(createVerdictProvider({ ...base, name: 'mock' }).id).toBe('mock');
    expect(createVerdictProvider({ ...base, name: 'auto' }).id).toBe('mock');
  });
});
