/**
 * @docweave/shared — contract types, event bus and run history.
 */

export * from './types/index.js';
export { EventBus, createEvent } from './event-bus/index.js';
export type { WildcardChannel } from './event-bus/index.js';
export { RunStore } from './run-store/index.js';
export type {
  WorkflowSummary,
  RunSummary,
  RunListOptions,
  RunStoreStats,
} from './run-store/index.js';
