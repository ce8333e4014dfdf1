/**
 * Event Bus
 *
 * Typed publish/subscribe dispatch for device and session events.
 *
 * publish() snapshots the subscriber list for the event type and invokes
 * each handler synchronously in subscription order. A handler that throws is
 * logged and skipped; the publisher never sees the error. Handlers that return
 * a promise are tracked until they settle, and a rejection is logged the same
 * way. idle() waits for every tracked handler.
 */

import { getLogger, errorMessage } from '../logger';
import {
  AgentEvents,
  AgentEventType,
  EventHandler,
  Unsubscribe,
} from './types';

const log = getLogger('EventBus');

type HandlerMap = { [K in AgentEventType]: Array<EventHandler<K>> };

export class EventBus {
  private handlers: HandlerMap = {
    DeviceConnected: [],
    DeviceDisconnected: [],
    SessionStarted: [],
    SessionStopped: [],
    SessionFailed: [],
  };
  private pending = new Set<Promise<void>>();
  private _handlerErrors = 0;

  /** Number of handler failures (sync throws and async rejections) so far */
  get handlerErrors(): number {
    return this._handlerErrors;
  }

  subscribe<K extends AgentEventType>(type: K, handler: EventHandler<K>): Unsubscribe {
    this.handlers[type].push(handler);
    return () => this.unsubscribe(type, handler);
  }

  /** Remove one registration of the handler; unknown handlers are ignored */
  unsubscribe<K extends AgentEventType>(type: K, handler: EventHandler<K>): void {
    const list = this.handlers[type];
    const idx = list.indexOf(handler);
    if (idx !== -1) list.splice(idx, 1);
  }

  listenerCount(type: AgentEventType): number {
    return this.handlers[type].length;
  }

  publish<K extends AgentEventType>(type: K, event: AgentEvents[K]): void {
    const snapshot = this.handlers[type].slice();
    log.debug({ type, handlers: snapshot.length }, 'Publishing event');

    for (const handler of snapshot) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          this.track(type, result);
        }
      } catch (err) {
        this._handlerErrors++;
        log.error({ type, error: errorMessage(err) }, 'Event handler failed');
      }
    }
  }

  /** Resolve once every async handler started so far has settled */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private track(type: AgentEventType, result: Promise<void>): void {
    const task: Promise<void> = result.then(
      () => {
        this.pending.delete(task);
      },
      (err: unknown) => {
        this.pending.delete(task);
        this._handlerErrors++;
        log.error({ type, error: errorMessage(err) }, 'Async event handler failed');
      },
    );
    this.pending.add(task);
  }
}
