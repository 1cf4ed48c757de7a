import { boundedCall, type CallSite } from './invoke.js';
import { buildTitlePrompt } from './prompts.js';
import { cleanResponse } from './sanitize.js';

export const DEFAULT_TITLE = 'New Conversation';
export const TITLE_MAX = 50;

/** First line of a model's title reply, unquoted and capped; '' when nothing is left. */
export function cleanTitle(raw: string): string {
  const line = cleanResponse(raw).split('\n')[0] ?? '';
  const title = line.replace(/^title:\s*/i, '').replace(/["'`*]/g, '').trim();
  return title.length > TITLE_MAX ? `${title.slice(0, TITLE_MAX - 3)}...` : title;
}

/**
 * Ask `model` for a short title. Never rejects; null when the call fails or
 * the reply holds no usable title.
 */
export async function generateTitle(site: CallSite, model: string, question: string): Promise<string | null> {
  const outcome = await boundedCall(site, 'title', { name: 'title', model }, [
    { role: 'user', content: buildTitlePrompt(question) },
  ]);
  if (!outcome.ok) return null;
  return cleanTitle(outcome.content) || null;
}
