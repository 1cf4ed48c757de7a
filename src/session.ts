/**
 * Conversation storage. One JSON file per conversation, written atomically
 * (temp file + rename) so a crash mid-write never leaves a torn file.
 */

import { readFile, writeFile, rename, mkdir, readdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { DEFAULT_TITLE, TITLE_MAX } from './title.js';
import type {
  AdvisorResponse,
  AssistantMessage,
  Conversation,
  ConversationMeta,
  DeliberationMetadata,
  GroupChatResponse,
  GroupChatSession,
  RankingEntry,
  SynthesisResult,
} from './types.js';

// --- Stored shapes ---

const ParticipantSchema = z.object({ advisor: z.string(), model: z.string() });

const UserMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
  createdAt: z.number(),
});

const AssistantMessageSchema = z.object({
  role: z.literal('assistant'),
  stage1: z.array(z.object({ advisor: z.string(), model: z.string(), response: z.string() })),
  stage2: z.array(
    z.object({
      advisor: z.string(),
      model: z.string(),
      ranking: z.string(),
      parsedRanking: z.array(z.string()),
    }),
  ),
  stage3: z.object({ model: z.string(), response: z.string() }),
  metadata: z
    .object({
      labelMap: z.record(ParticipantSchema),
      aggregate: z.array(
        ParticipantSchema.extend({ averageRank: z.number(), votes: z.number() }),
      ),
    })
    .optional(),
  createdAt: z.number(),
});

const ConversationSchema = z.object({
  id: z.string(),
  createdAt: z.number(),
  title: z.string(),
  messages: z.array(z.discriminatedUnion('role', [UserMessageSchema, AssistantMessageSchema])),
});

const GroupChatSessionSchema = z.object({
  id: z.string(),
  createdAt: z.number(),
  title: z.string(),
  memberIds: z.array(z.string()),
  messages: z.array(
    z.discriminatedUnion('role', [
      UserMessageSchema,
      z.object({
        role: z.literal('assistant'),
        responses: z.array(
          z.object({
            advisorId: z.string(),
            advisorName: z.string(),
            model: z.string(),
            response: z.string(),
          }),
        ),
        createdAt: z.number(),
      }),
    ]),
  ),
});

export class ConversationNotFoundError extends Error {
  constructor(public id: string) {
    super(`Conversation not found: ${id}`);
    this.name = 'ConversationNotFoundError';
  }
}

export interface AssistantTurn {
  stage1: AdvisorResponse[];
  stage2: RankingEntry[];
  stage3: SynthesisResult;
  metadata?: DeliberationMetadata;
}

export interface ConversationStore {
  create(id?: string): Promise<Conversation>;
  /** null when no such conversation exists */
  get(id: string): Promise<Conversation | null>;
  /** Newest first */
  list(): Promise<ConversationMeta[]>;
  delete(id: string): Promise<boolean>;
  addUserMessage(id: string, content: string): Promise<Conversation>;
  addAssistantMessage(id: string, turn: AssistantTurn): Promise<Conversation>;
  setTitle(id: string, title: string): Promise<Conversation>;
}

// --- Shared file mechanics ---

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

class JsonDirectory<T extends { id: string; createdAt: number }> {
  constructor(
    private dir: string,
    private schema: z.ZodType<T>,
    private kind: string,
  ) {}

  private pathFor(id: string): string {
    if (!SAFE_ID.test(id)) throw new Error(`Invalid ${this.kind} id: ${id}`);
    return join(this.dir, `${id}.json`);
  }

  async read(id: string): Promise<T | null> {
    const path = this.pathFor(id);
    if (!existsSync(path)) return null;
    const parsed = this.schema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
    if (!parsed.success) {
      throw new Error(`Corrupt ${this.kind} file ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  async write(value: T): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(value.id);
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(value, null, 2), 'utf-8');
    await rename(tmp, path);
  }

  async remove(id: string): Promise<boolean> {
    const path = this.pathFor(id);
    if (!existsSync(path)) return false;
    await rm(path);
    return true;
  }

  /** Every readable entry; unparseable files are reported to onSkip. */
  async all(onSkip: (file: string, err: unknown) => void): Promise<T[]> {
    if (!existsSync(this.dir)) return [];
    const files = (await readdir(this.dir)).filter((f) => f.endsWith('.json'));
    const out: T[] = [];
    for (const file of files) {
      try {
        const value = await this.read(file.slice(0, -'.json'.length));
        if (value) out.push(value);
      } catch (err) {
        onSkip(file, err);
      }
    }
    return out.sort((a, b) => b.createdAt - a.createdAt);
  }
}

// --- Deliberation conversations ---

export class FileConversationStore implements ConversationStore {
  private files: JsonDirectory<Conversation>;

  /**
   * @param dataDir conversations live under `<dataDir>/conversations/`
   * @param onWarn told about files that cannot be listed
   */
  constructor(
    dataDir: string,
    private onWarn: (message: string) => void = () => {},
  ) {
    this.files = new JsonDirectory(join(dataDir, 'conversations'), ConversationSchema, 'conversation');
  }

  async create(id: string = randomUUID()): Promise<Conversation> {
    const conversation: Conversation = { id, createdAt: Date.now(), title: DEFAULT_TITLE, messages: [] };
    await this.files.write(conversation);
    return conversation;
  }

  get(id: string): Promise<Conversation | null> {
    return this.files.read(id);
  }

  async list(): Promise<ConversationMeta[]> {
    const all = await this.files.all((file, err) =>
      this.onWarn(`Skipping conversation file ${file}: ${err instanceof Error ? err.message : String(err)}`),
    );
    return all.map((c) => ({
      id: c.id,
      createdAt: c.createdAt,
      title: c.title,
      messageCount: c.messages.length,
    }));
  }

  delete(id: string): Promise<boolean> {
    return this.files.remove(id);
  }

  addUserMessage(id: string, content: string): Promise<Conversation> {
    return this.update(id, (c) => {
      c.messages.push({ role: 'user', content, createdAt: Date.now() });
    });
  }

  addAssistantMessage(id: string, turn: AssistantTurn): Promise<Conversation> {
    const message: AssistantMessage = {
      role: 'assistant',
      stage1: turn.stage1,
      stage2: turn.stage2,
      stage3: turn.stage3,
      ...(turn.metadata ? { metadata: turn.metadata } : {}),
      createdAt: Date.now(),
    };
    return this.update(id, (c) => {
      c.messages.push(message);
    });
  }

  setTitle(id: string, title: string): Promise<Conversation> {
    return this.update(id, (c) => {
      c.title = title;
    });
  }

  private async update(id: string, mutate: (c: Conversation) => void): Promise<Conversation> {
    const conversation = await this.files.read(id);
    if (!conversation) throw new ConversationNotFoundError(id);
    mutate(conversation);
    await this.files.write(conversation);
    return conversation;
  }
}

// --- Group chat sessions ---

export class FileGroupChatStore {
  private files: JsonDirectory<GroupChatSession>;

  constructor(
    dataDir: string,
    private onWarn: (message: string) => void = () => {},
  ) {
    this.files = new JsonDirectory(join(dataDir, 'group-chats'), GroupChatSessionSchema, 'group chat');
  }

  async create(memberIds: string[], id: string = randomUUID()): Promise<GroupChatSession> {
    const session: GroupChatSession = {
      id,
      createdAt: Date.now(),
      title: DEFAULT_TITLE,
      memberIds: [...memberIds],
      messages: [],
    };
    await this.files.write(session);
    return session;
  }

  get(id: string): Promise<GroupChatSession | null> {
    return this.files.read(id);
  }

  list(): Promise<GroupChatSession[]> {
    return this.files.all((file, err) =>
      this.onWarn(`Skipping group chat file ${file}: ${err instanceof Error ? err.message : String(err)}`),
    );
  }

  delete(id: string): Promise<boolean> {
    return this.files.remove(id);
  }

  /**
   * Append one question and the answers it drew. An untitled session takes
   * `title`, or the start of the question without one.
   */
  async addExchange(
    id: string,
    question: string,
    responses: GroupChatResponse[],
    title?: string,
  ): Promise<GroupChatSession> {
    const session = await this.files.read(id);
    if (!session) throw new ConversationNotFoundError(id);
    const now = Date.now();
    session.messages.push({ role: 'user', content: question, createdAt: now });
    session.messages.push({ role: 'assistant', responses, createdAt: now });
    if (session.title === DEFAULT_TITLE) session.title = title || question.slice(0, TITLE_MAX);
    await this.files.write(session);
    return session;
  }
}
