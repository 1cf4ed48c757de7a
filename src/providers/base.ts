import { completeSimple, getModels } from '@mariozechner/pi-ai';
import type { Api, AssistantMessage, Context, KnownProvider, Model } from '@mariozechner/pi-ai';
import { GatewayError, errorMessage } from '../errors.js';
import type {
  ChatMessage,
  GatewayConfig,
  GatewayProvider,
  GatewayReply,
  GatewayRequest,
  ModelGateway,
} from '../types.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

// ============================================================================
// Pi-ai model resolution
// ============================================================================

/**
 * Providers pi-ai knows natively. Ollama, DeepSeek and custom hosts go through
 * the OpenAI-compatible completions API instead.
 */
function registryProvider(p: GatewayProvider): KnownProvider | null {
  switch (p) {
    case 'openai':
    case 'anthropic':
    case 'google':
    case 'mistral':
    case 'groq':
    case 'xai':
      return p;
    default:
      return null;
  }
}

/** Ollama's OpenAI-compatible endpoint lives under /v1 of the host root. */
export function openAiCompatibleUrl(config: GatewayConfig): string {
  switch (config.provider) {
    case 'ollama': {
      const root = (config.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
      return root.endsWith('/v1') ? root : `${root}/v1`;
    }
    case 'deepseek':
      return config.baseUrl ?? 'https://api.deepseek.com/v1';
    default:
      return config.baseUrl ?? '';
  }
}

/**
 * Map a model id to a pi-ai Model descriptor: the registered one when pi-ai
 * knows the model, otherwise an OpenAI-compatible descriptor.
 */
export function resolveModel(config: GatewayConfig, modelId: string): Model<Api> {
  const known = registryProvider(config.provider);
  if (known) {
    const registered = getModels(known).find((m) => m.id === modelId);
    if (registered) {
      return { ...registered, baseUrl: config.baseUrl ?? registered.baseUrl };
    }
  }

  const model: Model<Api> = {
    id: modelId,
    name: modelId,
    api: 'openai-completions',
    provider: known ?? config.provider,
    baseUrl: openAiCompatibleUrl(config),
    reasoning: false,
    input: ['text'],
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
    contextWindow: 128000,
    maxTokens: 4096,
    headers: {},
  };
  return model;
}

// ============================================================================
// Credentials
// ============================================================================

/**
 * Priority: explicit auth config → <PROVIDER>_API_KEY → placeholder for
 * local hosts.
 */
export function resolveApiKey(config: GatewayConfig): string {
  const auth = config.auth;
  if (auth?.method === 'api_key') return auth.apiKey;
  if (auth?.method === 'env') {
    const value = process.env[auth.envVar];
    if (value) return value;
  }

  const envKey = process.env[`${config.provider.toUpperCase()}_API_KEY`];
  if (envKey) return envKey;

  if (config.provider === 'ollama' || config.provider === 'custom') {
    return 'ollama'; // placeholder, not validated
  }
  return '';
}

// ============================================================================
// Gateway
// ============================================================================

/**
 * Fold system-role messages into the system prompt. An explicit system prompt
 * replaces them.
 */
export function buildContext(messages: ChatMessage[], systemPrompt?: string): Context {
  const inline = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');
  const system = systemPrompt || inline || undefined;

  return {
    systemPrompt: system,
    messages: messages
      .filter((m) => m.role === 'user')
      .map((m) => ({
        role: 'user' as const,
        content: [{ type: 'text' as const, text: m.content }],
        timestamp: Date.now(),
      })),
  };
}

export function extractText(
  result: Pick<AssistantMessage, 'content' | 'errorMessage'>,
  label: string,
): string {
  if (result.errorMessage) {
    throw new GatewayError(`${label}: ${result.errorMessage.slice(0, 200)}`, 'upstream');
  }
  for (const block of result.content) {
    if (block.type === 'text' && block.text) return block.text;
  }
  // Reasoning-only replies: hand back the thinking so the sanitizer decides
  for (const block of result.content) {
    if (block.type === 'thinking' && block.thinking) {
      return `<think>${block.thinking}</think>`;
    }
  }
  throw new GatewayError(`${label}: empty response`, 'empty');
}

/**
 * Create a gateway for one model host. Each invoke is a single request bounded
 * by its own timeout; nothing is retried.
 */
export function createGateway(config: GatewayConfig): ModelGateway {
  const apiKey = resolveApiKey(config);

  return {
    async invoke(request: GatewayRequest): Promise<GatewayReply> {
      const model = resolveModel(config, request.model);
      const label = `${config.provider}/${request.model}`;
      const ac = new AbortController();
      const onOuterAbort = () => ac.abort();
      request.signal?.addEventListener('abort', onOuterAbort, { once: true });

      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            new GatewayError(`${label} timed out after ${request.timeoutMs / 1000}s`, 'timeout'),
          );
          ac.abort();
        }, request.timeoutMs);
      });

      try {
        const result = await Promise.race([
          completeSimple(model, buildContext(request.messages, request.systemPrompt), {
            apiKey,
            maxTokens: 4096,
            signal: ac.signal,
          }),
          timeout,
        ]);
        return { content: extractText(result, label) };
      } catch (err) {
        if (err instanceof GatewayError) throw err;
        if (ac.signal.aborted) {
          throw new GatewayError(`${label} aborted`, 'timeout');
        }
        throw new GatewayError(`${label}: ${errorMessage(err)}`, 'transport');
      } finally {
        clearTimeout(timer);
        request.signal?.removeEventListener('abort', onOuterAbort);
      }
    },
  };
}
