import { describe, it, expect, vi } from 'vitest';
import {
  buildConversationContext,
  buildPromptWithContext,
  generateGroupChatTitle,
  runGroupChat,
} from './group-chat.js';
import { StatsRecorder } from './monitoring.js';
import type { CouncilSettings, GatewayRequest, ModelGateway, UserMessage } from './types.js';

const settings: CouncilSettings = {
  gateway: { provider: 'ollama', timeout: 300 },
  advisors: [
    { id: 'alpha', name: 'Alpha', model: 'm1', prompt: 'alpha.md' },
    { id: 'beta', name: 'Beta', model: 'm2', prompt: 'beta.md' },
    { id: 'gamma', name: 'Gamma', model: 'm3', prompt: 'gamma.md' },
  ],
  chairmanModel: 'chair',
  personasDir: '/nonexistent',
  dataDir: '/nonexistent',
};

function user(content: string): UserMessage {
  return { role: 'user', content, createdAt: 0 };
}

describe('buildConversationContext', () => {
  it('is empty without history', () => {
    expect(buildConversationContext([])).toBe('');
  });

  it('formats user turns and each advisor reply', () => {
    const ctx = buildConversationContext([
      user('Price?'),
      {
        role: 'assistant',
        createdAt: 0,
        responses: [
          { advisorId: 'alpha', advisorName: 'Alpha', model: 'm1', response: 'High.' },
          { advisorId: 'beta', advisorName: 'Beta', model: 'm2', response: 'Low.' },
        ],
      },
    ]);
    expect(ctx).toBe('Previous conversation:\n\nUser: Price?\n\nAlpha: High.\n\nBeta: Low.');
  });

  it('keeps only the last ten messages', () => {
    const history = Array.from({ length: 12 }, (_, i) => user(`m${i}`));
    const users = buildConversationContext(history)
      .split('\n')
      .filter((l) => l.startsWith('User: '));
    expect(users).toEqual(Array.from({ length: 10 }, (_, i) => `User: m${i + 2}`));
  });
});

describe('buildPromptWithContext', () => {
  it('passes the question through without context', () => {
    expect(buildPromptWithContext('Why?', '')).toBe('Why?');
  });

  it('appends the question after the context', () => {
    expect(buildPromptWithContext('Why?', 'Previous conversation:\n\nUser: hi')).toBe(
      "Previous conversation:\n\nUser: hi\n\nUser: Why?\n\nPlease respond to the user's latest question, taking into account the conversation history.",
    );
  });
});

describe('runGroupChat', () => {
  it('asks selected members one at a time in roster order', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const seen: GatewayRequest[] = [];
    const gateway: ModelGateway = {
      invoke: vi.fn(async (request: GatewayRequest) => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        seen.push(request);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return { content: `<think>x</think>reply from ${request.model}` };
      }),
    };

    const responses = await runGroupChat(
      settings,
      gateway,
      { question: 'Go?', memberIds: ['gamma', 'alpha', 'unknown'], history: [] },
      { loadSystemPrompt: async (ref) => `persona ${ref}` },
    );

    expect(responses).toEqual([
      { advisorId: 'alpha', advisorName: 'Alpha', model: 'm1', response: 'reply from m1' },
      { advisorId: 'gamma', advisorName: 'Gamma', model: 'm3', response: 'reply from m3' },
    ]);
    expect(maxInFlight).toBe(1);
    expect(seen.map((r) => [r.model, r.systemPrompt, r.messages[0].content])).toEqual([
      ['m1', 'persona alpha.md', 'Go?'],
      ['m3', 'persona gamma.md', 'Go?'],
    ]);
  });

  it('embeds history in the prompt', async () => {
    const seen: GatewayRequest[] = [];
    const gateway: ModelGateway = {
      invoke: async (request) => {
        seen.push(request);
        return { content: 'ok' };
      },
    };
    await runGroupChat(settings, gateway, { question: 'And now?', memberIds: ['beta'], history: [user('Before')] });
    expect(seen[0].messages[0].content).toBe(
      "Previous conversation:\n\nUser: Before\n\nUser: And now?\n\nPlease respond to the user's latest question, taking into account the conversation history.",
    );
  });

  it('gives a failed member an empty response and records the failure', async () => {
    const stats = new StatsRecorder();
    const gateway: ModelGateway = {
      invoke: async (request) => {
        if (request.model === 'm2') throw new Error('model not loaded');
        return { content: 'fine' };
      },
    };
    const responses = await runGroupChat(
      settings,
      gateway,
      { question: 'Q', memberIds: ['alpha', 'beta'], history: [] },
      { observer: stats },
    );
    expect(responses.map((r) => r.response)).toEqual(['fine', '']);
    expect(stats.recentFailures()).toMatchObject([{ advisor: 'Beta', stage: 'chat', error: 'model not loaded' }]);
  });

  it('returns [] without members and makes no calls', async () => {
    const gateway: ModelGateway = { invoke: vi.fn(async () => ({ content: 'x' })) };
    expect(await runGroupChat(settings, gateway, { question: 'Q', memberIds: [], history: [] })).toEqual([]);
    expect(gateway.invoke).not.toHaveBeenCalled();
  });
});

describe('generateGroupChatTitle', () => {
  it('asks the title model and cleans its reply', async () => {
    const seen: GatewayRequest[] = [];
    const gateway: ModelGateway = {
      invoke: async (request) => {
        seen.push(request);
        return { content: 'Title: "Pricing Strategy"' };
      },
    };
    const title = await generateGroupChatTitle({ ...settings, titleModel: 'small' }, gateway, 'How do we price?');
    expect(title).toBe('Pricing Strategy');
    expect(seen.map((r) => r.model)).toEqual(['small']);
  });

  it('falls back to the start of the message when the call fails', async () => {
    const gateway: ModelGateway = {
      invoke: async () => {
        throw new Error('offline');
      },
    };
    const message = 'x'.repeat(80);
    expect(await generateGroupChatTitle(settings, gateway, message)).toBe('x'.repeat(50));
  });
});
