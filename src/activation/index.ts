export { ActivationEngine, ACTIVE_KEY, LIVE_KEYS } from './engine.js';
export type {
  ActivationEvent,
  ActivationEventHandler,
  StatusReport,
  UseResult,
} from './engine.js';
