/**
 * In-process event bus between engine components and the alert dispatcher.
 */

import type { EngineEvent, EventListener } from "../types/events.js";

export type Publish = (event: EngineEvent) => Promise<void>;

export class EventBus {
  private listeners: EventListener[] = [];

  subscribe(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /**
   * Deliver to every listener in subscription order.
   * A failing listener is logged and does not stop the others or the publisher.
   */
  publish: Publish = async (event) => {
    for (const listener of this.listeners) {
      try {
        await listener(event);
      } catch (err) {
        console.error(`[events] Listener failed for ${event.type}:`, err);
      }
    }
  };
}
