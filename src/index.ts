export * from './types.js';
export * from './errors.js';
export { Council, DEFAULT_TITLE, type CouncilOptions, type DeliberateOptions } from './council.js';
export { cleanResponse, stripReasoning } from './sanitize.js';
export { RANKING_HEADER, aggregateRankings, buildLabelMap, labelFor, parseRanking } from './ranking.js';
export { buildChairmanPrompt, buildRankingPrompt, buildTitlePrompt } from './prompts.js';
export { createGateway } from './providers/base.js';
export { createPromptLoader, extractSystemPrompt, renderBasicPersona, writePersona } from './persona.js';
export {
  loadConfig,
  saveConfig,
  toSettings,
  addAdvisor,
  removeAdvisor,
  setChairman,
  resolveConfigPath,
  DEFAULT_CONFIG,
} from './config.js';
export { StatsRecorder, combineObservers, getGatewayStatus, listHostModels, type StatsSnapshot } from './monitoring.js';
export {
  FileConversationStore,
  FileGroupChatStore,
  ConversationNotFoundError,
  type ConversationStore,
  type AssistantTurn,
} from './session.js';
export {
  runGroupChat,
  buildConversationContext,
  generateGroupChatTitle,
  type GroupChatInput,
  type GroupChatOptions,
} from './group-chat.js';
export { cleanTitle, generateTitle } from './title.js';
