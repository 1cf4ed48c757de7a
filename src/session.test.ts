import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConversationNotFoundError, FileConversationStore, FileGroupChatStore } from './session.js';
import type { AssistantTurn } from './session.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'council-store-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

const turn: AssistantTurn = {
  stage1: [{ advisor: 'Alpha', model: 'm1', response: 'Yes.' }],
  stage2: [{ advisor: 'Alpha', model: 'm1', ranking: 'FINAL RANKING:\n1. Response A', parsedRanking: ['Response A'] }],
  stage3: { model: 'chair', response: 'Final.' },
  metadata: {
    labelMap: { 'Response A': { advisor: 'Alpha', model: 'm1' } },
    aggregate: [{ advisor: 'Alpha', model: 'm1', averageRank: 1, votes: 1 }],
  },
};

describe('FileConversationStore', () => {
  it('creates and reads back a conversation', async () => {
    const store = new FileConversationStore(dir);
    const created = await store.create('conv-1');
    expect(created).toMatchObject({ id: 'conv-1', title: 'New Conversation', messages: [] });
    expect(await store.get('conv-1')).toEqual(created);
    expect(await store.get('nope')).toBeNull();
  });

  it('appends messages and sets the title', async () => {
    const store = new FileConversationStore(dir);
    await store.create('conv-1');
    await store.addUserMessage('conv-1', 'Should we?');
    await store.addAssistantMessage('conv-1', turn);
    await store.setTitle('conv-1', 'Deciding');

    const c = await store.get('conv-1');
    expect(c?.title).toBe('Deciding');
    expect(c?.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(c?.messages[1]).toMatchObject({ role: 'assistant', stage3: { model: 'chair', response: 'Final.' } });
  });

  it('writes one file per conversation with no temp files left', async () => {
    const store = new FileConversationStore(dir);
    await store.create('conv-1');
    await store.addUserMessage('conv-1', 'hi');
    expect(await readdir(join(dir, 'conversations'))).toEqual(['conv-1.json']);
  });

  it('lists metadata newest first', async () => {
    const store = new FileConversationStore(dir);
    const now = vi.spyOn(Date, 'now');
    now.mockReturnValue(1_000);
    await store.create('older');
    now.mockReturnValue(2_000);
    await store.create('newer');
    await store.addUserMessage('newer', 'q');

    expect(await store.list()).toEqual([
      { id: 'newer', createdAt: 2_000, title: 'New Conversation', messageCount: 1 },
      { id: 'older', createdAt: 1_000, title: 'New Conversation', messageCount: 0 },
    ]);
  });

  it('skips corrupt files when listing and reports them', async () => {
    const warn = vi.fn();
    const store = new FileConversationStore(dir, warn);
    await store.create('good');
    await mkdir(join(dir, 'conversations'), { recursive: true });
    await writeFile(join(dir, 'conversations', 'bad.json'), '{"id": 1}');

    const list = await store.list();
    expect(list.map((c) => c.id)).toEqual(['good']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^Skipping conversation file bad\.json: Corrupt conversation file/);
  });

  it('lists nothing before the first conversation', async () => {
    expect(await new FileConversationStore(dir).list()).toEqual([]);
  });

  it('deletes conversations', async () => {
    const store = new FileConversationStore(dir);
    await store.create('conv-1');
    expect(await store.delete('conv-1')).toBe(true);
    expect(await store.delete('conv-1')).toBe(false);
    expect(await store.get('conv-1')).toBeNull();
  });

  it('rejects updates to unknown conversations and unsafe ids', async () => {
    const store = new FileConversationStore(dir);
    await expect(store.addUserMessage('ghost', 'hi')).rejects.toBeInstanceOf(ConversationNotFoundError);
    await expect(store.get('../escape')).rejects.toThrow('Invalid conversation id: ../escape');
  });
});

describe('FileGroupChatStore', () => {
  it('records exchanges and titles the session from the first question', async () => {
    const store = new FileGroupChatStore(dir);
    const session = await store.create(['alpha', 'beta'], 'chat-1');
    expect(session.memberIds).toEqual(['alpha', 'beta']);

    const updated = await store.addExchange('chat-1', 'How do we price this?', [
      { advisorId: 'alpha', advisorName: 'Alpha', model: 'm1', response: 'Cost plus.' },
    ]);
    expect(updated.title).toBe('How do we price this?');
    expect(updated.messages).toHaveLength(2);
    expect(updated.messages[1]).toMatchObject({ role: 'assistant', responses: [{ advisorId: 'alpha' }] });

    expect((await store.list()).map((s) => s.id)).toEqual(['chat-1']);
    expect(await readdir(join(dir, 'group-chats'))).toEqual(['chat-1.json']);
  });

  it('takes a generated title on the first exchange and keeps it afterwards', async () => {
    const store = new FileGroupChatStore(dir);
    await store.create(['alpha'], 'chat-2');
    const reply = [{ advisorId: 'alpha', advisorName: 'Alpha', model: 'm1', response: 'Yes.' }];

    const first = await store.addExchange('chat-2', 'Should we hire?', reply, 'Hiring Plans');
    expect(first.title).toBe('Hiring Plans');

    const second = await store.addExchange('chat-2', 'When?', reply, 'Other Title');
    expect(second.title).toBe('Hiring Plans');
    expect(second.messages).toHaveLength(4);
  });
});
