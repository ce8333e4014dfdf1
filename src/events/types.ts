/**
 * Agent Event Types
 *
 * Payloads published on the agent's event bus, keyed by event name.
 */

import type { AppiumSession, Device } from '../devices/types';

export interface DeviceConnectedEvent {
  device: Device;
}

export interface DeviceDisconnectedEvent {
  device: Device;
}

export interface SessionStartedEvent {
  device: Device;
  session: AppiumSession;
}

export interface SessionStoppedEvent {
  device: Device;
  session: AppiumSession;
}

export interface SessionFailedEvent {
  device: Device;
  reason: string;
}

export interface AgentEvents {
  DeviceConnected: DeviceConnectedEvent;
  DeviceDisconnected: DeviceDisconnectedEvent;
  SessionStarted: SessionStartedEvent;
  SessionStopped: SessionStoppedEvent;
  SessionFailed: SessionFailedEvent;
}

export type AgentEventType = keyof AgentEvents;

export const AGENT_EVENT_TYPES: readonly AgentEventType[] = [
  'DeviceConnected',
  'DeviceDisconnected',
  'SessionStarted',
  'SessionStopped',
  'SessionFailed',
];

export type EventHandler<K extends AgentEventType> =
  (event: AgentEvents[K]) => void | Promise<void>;

/** Subscription handle: call to unsubscribe */
export type Unsubscribe = () => void;
