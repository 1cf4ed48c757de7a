/**
 * Group chat: selected advisors answer in turn, with recent history as
 * context. No ranking, no synthesis.
 */

import { boundedCall, personaFor, type CallSite } from './invoke.js';
import { cleanResponse } from './sanitize.js';
import { TITLE_MAX, generateTitle } from './title.js';
import type {
  CallObserver,
  CouncilSettings,
  GroupAssistantMessage,
  GroupChatResponse,
  ModelGateway,
  SystemPromptLoader,
  UserMessage,
} from './types.js';

export const HISTORY_WINDOW = 10;

export interface GroupChatInput {
  question: string;
  memberIds: readonly string[];
  history: ReadonlyArray<UserMessage | GroupAssistantMessage>;
}

export interface GroupChatOptions {
  loadSystemPrompt?: SystemPromptLoader;
  observer?: CallObserver;
  onWarn?: (message: string) => void;
  timeoutMs?: number;
}

/** Transcript of the last `maxMessages` messages; '' without history. */
export function buildConversationContext(
  history: GroupChatInput['history'],
  maxMessages = HISTORY_WINDOW,
): string {
  if (history.length === 0) return '';
  const parts = ['Previous conversation:'];
  for (const msg of history.slice(-maxMessages)) {
    if (msg.role === 'user') {
      parts.push(`\nUser: ${msg.content}`);
    } else {
      for (const r of msg.responses) parts.push(`\n${r.advisorName}: ${r.response}`);
    }
  }
  return parts.join('\n');
}

export function buildPromptWithContext(question: string, context: string): string {
  if (!context) return question;
  return `${context}\n\nUser: ${question}\n\nPlease respond to the user's latest question, taking into account the conversation history.`;
}

function siteFor(settings: CouncilSettings, gateway: ModelGateway, options: GroupChatOptions): CallSite {
  return {
    gateway,
    timeoutMs: options.timeoutMs ?? settings.gateway.timeout * 1000,
    observer: options.observer,
    warn: options.onWarn ?? (() => {}),
  };
}

/**
 * Ask each selected member (roster order), one after another. A failed member
 * answers with ''. Unknown ids are ignored.
 */
export async function runGroupChat(
  settings: CouncilSettings,
  gateway: ModelGateway,
  input: GroupChatInput,
  options: GroupChatOptions = {},
): Promise<GroupChatResponse[]> {
  const wanted = new Set(input.memberIds);
  const members = settings.advisors.filter((a) => wanted.has(a.id));
  if (members.length === 0) return [];

  const site = siteFor(settings, gateway, options);
  const prompt = buildPromptWithContext(input.question, buildConversationContext(input.history));

  const responses: GroupChatResponse[] = [];
  for (const advisor of members) {
    const system = await personaFor(options.loadSystemPrompt, advisor, site.warn);
    const outcome = await boundedCall(
      site,
      'chat',
      { name: advisor.name, model: advisor.model },
      [{ role: 'user', content: prompt }],
      system,
    );
    responses.push({
      advisorId: advisor.id,
      advisorName: advisor.name,
      model: advisor.model,
      response: outcome.ok ? cleanResponse(outcome.content) : '',
    });
  }
  return responses;
}

/**
 * Title for a new group chat from its first message, by the title model
 * (chairman when unset). Falls back to the start of the message.
 */
export async function generateGroupChatTitle(
  settings: CouncilSettings,
  gateway: ModelGateway,
  firstMessage: string,
  options: GroupChatOptions = {},
): Promise<string> {
  const model = settings.titleModel ?? settings.chairmanModel;
  const title = await generateTitle(siteFor(settings, gateway, options), model, firstMessage);
  return title ?? firstMessage.slice(0, TITLE_MAX);
}
