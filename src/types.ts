/**
 * Core types for the advisor council
 */

// --- Gateway ---

export interface ChatMessage {
  role: 'user' | 'system';
  content: string;
}

export interface GatewayRequest {
  model: string;
  messages: ChatMessage[];
  systemPrompt?: string;
  /** Upper bound for this one call, in milliseconds */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface GatewayReply {
  content: string;
}

/**
 * Single-call boundary to a language-model host. Rejects on failure.
 */
export interface ModelGateway {
  invoke(request: GatewayRequest): Promise<GatewayReply>;
}

export type GatewayProvider =
  | 'ollama'
  | 'openai'
  | 'anthropic'
  | 'google'
  | 'mistral'
  | 'deepseek'
  | 'groq'
  | 'xai'
  | 'custom';

export type AuthConfig =
  | { method: 'api_key'; apiKey: string }
  | { method: 'env'; envVar: string } // reads key from env at call time
  | { method: 'none' }; // local hosts (Ollama, LM Studio)

export interface GatewayConfig {
  provider: GatewayProvider;
  baseUrl?: string;
  auth?: AuthConfig;
  /** Per-call timeout in seconds (default 300) */
  timeout: number;
}

// --- Roster ---

export interface AdvisorSpec {
  id: string;
  name: string;
  model: string;
  /** Opaque reference handed to loadSystemPrompt (a persona file path) */
  prompt: string;
  description?: string;
}

export interface CouncilSettings {
  readonly gateway: Readonly<GatewayConfig>;
  readonly advisors: ReadonlyArray<Readonly<AdvisorSpec>>;
  readonly chairmanModel: string;
  readonly titleModel?: string;
  readonly personasDir: string;
  readonly dataDir: string;
}

export type SystemPromptLoader = (ref: string) => Promise<string>;

// --- Deliberation ---

/** "Response A", "Response B", … */
export type Label = string;

export interface Participant {
  advisor: string;
  model: string;
}

/** Label → participant, valid for one Stage-2 invocation only. */
export type LabelMap = Record<Label, Participant>;

export interface AdvisorResponse {
  advisor: string;
  model: string;
  response: string;
}

export interface RankingEntry {
  /** The advisor doing the ranking */
  advisor: string;
  model: string;
  /** Raw evaluation text */
  ranking: string;
  /** Empty when the ranking could not be parsed */
  parsedRanking: Label[];
}

export interface AggregateRankingEntry {
  advisor: string;
  model: string;
  averageRank: number;
  votes: number;
}

export interface SynthesisResult {
  model: string;
  response: string;
}

export interface Stage2Output {
  rankings: RankingEntry[];
  labelMap: LabelMap;
}

export interface DeliberationMetadata {
  labelMap: LabelMap;
  aggregate: AggregateRankingEntry[];
}

export interface DeliberationResult {
  question: string;
  stage1: AdvisorResponse[];
  stage2: RankingEntry[];
  stage3: SynthesisResult;
  metadata: DeliberationMetadata;
  title?: string;
}

export type PipelineState =
  | 'not_started'
  | 'stage1_running'
  | 'stage1_done'
  | 'stage2_running'
  | 'stage2_done'
  | 'stage3_running'
  | 'complete'
  | 'errored';

export type DeliberationEvent =
  | { type: 'stage1_start' }
  | { type: 'stage1_complete'; data: AdvisorResponse[] }
  | { type: 'stage2_start' }
  | {
      type: 'stage2_complete';
      data: RankingEntry[];
      labelMap: LabelMap;
      aggregate: AggregateRankingEntry[];
    }
  | { type: 'stage3_start' }
  | { type: 'stage3_complete'; data: SynthesisResult }
  | { type: 'title_complete'; title: string }
  | { type: 'complete' }
  | { type: 'error'; message: string };

// --- Observability ---

export type Stage = 'stage1' | 'stage2' | 'stage3' | 'title' | 'chat';

export type GatewayErrorKind = 'timeout' | 'transport' | 'upstream' | 'empty';

export type CallRecord =
  | {
      ok: true;
      advisor: string;
      model: string;
      stage: Stage;
      latencyMs: number;
      chars: number;
    }
  | {
      ok: false;
      advisor: string;
      model: string;
      stage: Stage;
      latencyMs: number;
      error: string;
      kind: GatewayErrorKind;
    };

export interface CallObserver {
  record(call: CallRecord): void;
}

// --- Storage ---

export interface UserMessage {
  role: 'user';
  content: string;
  createdAt: number;
}

export interface AssistantMessage {
  role: 'assistant';
  stage1: AdvisorResponse[];
  stage2: RankingEntry[];
  stage3: SynthesisResult;
  metadata?: DeliberationMetadata;
  createdAt: number;
}

export interface Conversation {
  id: string;
  createdAt: number;
  title: string;
  messages: Array<UserMessage | AssistantMessage>;
}

export interface ConversationMeta {
  id: string;
  createdAt: number;
  title: string;
  messageCount: number;
}

export interface GroupChatResponse {
  advisorId: string;
  advisorName: string;
  model: string;
  response: string;
}

export interface GroupAssistantMessage {
  role: 'assistant';
  responses: GroupChatResponse[];
  createdAt: number;
}

export interface GroupChatSession {
  id: string;
  createdAt: number;
  title: string;
  memberIds: string[];
  messages: Array<UserMessage | GroupAssistantMessage>;
}
