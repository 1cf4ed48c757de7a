import { GatewayError, errorKind, errorMessage } from './errors.js';
import type { AdvisorSpec, CallObserver, ChatMessage, ModelGateway, Stage, SystemPromptLoader } from './types.js';

export type CallOutcome = { ok: true; content: string } | { ok: false; error: string };

export interface CallSite {
  gateway: ModelGateway;
  timeoutMs: number;
  observer?: CallObserver | null;
  warn: (message: string) => void;
}

export interface Caller {
  name: string;
  model: string;
}

/**
 * One bounded gateway call. Never rejects: the outcome is recorded with the
 * observer and returned as a success/failure value.
 */
export async function boundedCall(
  site: CallSite,
  stage: Stage,
  caller: Caller,
  messages: ChatMessage[],
  systemPrompt?: string,
): Promise<CallOutcome> {
  const start = Date.now();
  const ac = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new GatewayError(`${caller.name} timed out after ${site.timeoutMs / 1000}s`, 'timeout'));
      ac.abort();
    }, site.timeoutMs);
  });

  try {
    const reply = await Promise.race([
      site.gateway.invoke({
        model: caller.model,
        messages,
        systemPrompt,
        timeoutMs: site.timeoutMs,
        signal: ac.signal,
      }),
      timeout,
    ]);
    site.observer?.record({
      ok: true,
      advisor: caller.name,
      model: caller.model,
      stage,
      latencyMs: Date.now() - start,
      chars: reply.content.length,
    });
    return { ok: true, content: reply.content };
  } catch (err) {
    const message = errorMessage(err);
    site.observer?.record({
      ok: false,
      advisor: caller.name,
      model: caller.model,
      stage,
      latencyMs: Date.now() - start,
      error: message,
      kind: errorKind(err),
    });
    site.warn(`${caller.name} (${caller.model}) failed in ${stage}: ${message}`);
    return { ok: false, error: message };
  } finally {
    clearTimeout(timer);
  }
}

/** Persona for an advisor; a load failure is warned about and yields none. */
export async function personaFor(
  loader: SystemPromptLoader | null | undefined,
  advisor: Readonly<AdvisorSpec>,
  warn: (message: string) => void,
): Promise<string | undefined> {
  if (!loader) return undefined;
  try {
    const prompt = await loader(advisor.prompt);
    return prompt || undefined;
  } catch (err) {
    warn(`${advisor.name}: persona unavailable, answering without it (${errorMessage(err)})`);
    return undefined;
  }
}
