/**
 * Typed event emitter for the reconciler
 */

import type { Logger } from './logger';
import { RECONCILE_EVENT } from './enums';
import type { EventEmitter, ReconcileEvents } from './interfaces';

type ListenerMap = {
  [K in keyof ReconcileEvents]: Set<(data: ReconcileEvents[K]) => void>;
};

// One set per event, created up front so listeners are only ever added to existing sets
function createListenerMap(): ListenerMap {
  return {
    [RECONCILE_EVENT.RUN_STARTED]: new Set(),
    [RECONCILE_EVENT.RUN_COMPLETED]: new Set(),
    [RECONCILE_EVENT.SCAN_COMPLETED]: new Set(),
    [RECONCILE_EVENT.RESOURCE_FAILED]: new Set(),
    [RECONCILE_EVENT.CONFLICT_DETECTED]: new Set(),
    [RECONCILE_EVENT.RECORD_APPLIED]: new Set(),
    [RECONCILE_EVENT.APPLY_FAILED]: new Set(),
    [RECONCILE_EVENT.RECORD_DROPPED]: new Set(),
    [RECONCILE_EVENT.SNAPSHOT_CREATED]: new Set(),
  };
}

export class ReconcileEventEmitter implements EventEmitter {
  private readonly listeners: ListenerMap = createListenerMap();

  constructor(private readonly logger?: Logger) {}

  on<K extends keyof ReconcileEvents>(event: K, listener: (data: ReconcileEvents[K]) => void): () => void {
    this.listenersFor(event).add(listener);

    // Return unsubscribe function
    return () => {
      this.off(event, listener);
    };
  }

  emit<K extends keyof ReconcileEvents>(event: K, data: ReconcileEvents[K]): void {
    this.listenersFor(event).forEach(listener => {
      try {
        listener(data);
      } catch (error) {
        this.logger?.error({ err: error, event }, 'Event listener threw');
      }
    });
  }

  off<K extends keyof ReconcileEvents>(event: K, listener: (data: ReconcileEvents[K]) => void): void {
    this.listenersFor(event).delete(listener);
  }

  removeAllListeners<K extends keyof ReconcileEvents>(event?: K): void {
    if (event) {
      this.listenersFor(event).clear();
    } else {
      Object.values(this.listeners).forEach(eventListeners => eventListeners.clear());
    }
  }

  // Utility method to get listener count for testing
  listenerCount<K extends keyof ReconcileEvents>(event: K): number {
    return this.listenersFor(event).size;
  }

  private listenersFor<K extends keyof ReconcileEvents>(event: K): Set<(data: ReconcileEvents[K]) => void> {
    return this.listeners[event];
  }
}
