/**
 * Event Module Exports
 */

export { EventBus } from './event-bus';
export type {
  AgentEvents,
  AgentEventType,
  EventHandler,
  Unsubscribe,
  DeviceConnectedEvent,
  DeviceDisconnectedEvent,
  SessionStartedEvent,
  SessionStoppedEvent,
  SessionFailedEvent,
} from './types';
export { AGENT_EVENT_TYPES } from './types';
