export * from './conversation.service.js';
export * from './state-machine.js';
export { ConversationStateStore } from './state.store.js';
export { scanAndExpire, startSessionSweeper } from './timeout.worker.js';
export { parseIntent, resolveIntentName, INTENT_NAMES } from './intents.js';
export type {
  ContextName,
  StepName,
  StateKey,
  Intent,
  IntentName,
  SessionState,
  TurnResult,
} from './state.types.js';
