type EventHandler<T> = (payload: T) => void | Promise<void>;

/**
 * Outbound domain events. Delivery and formatting (e-mail, push, in-app
 * notices) belong to whoever subscribes.
 */
export interface EventPayloads {
  'session.ended': { userId: string; entityId: string; reason: 'user' | 'timeout' };
  'badge.awarded': { userId: string; entityId: string; badgeName: string };
  'level.up': { userId: string; entityId: string; previousLevel: number; level: number };
  'streak.milestone': { userId: string; entityId: string; streak: number };
}

export type EventName = keyof EventPayloads;

export class EventBus {
  private handlers = new Map<EventName, Set<EventHandler<never>>>();

  /**
   * Subscribe to an event type
   * @returns Unsubscribe function
   */
  on<K extends EventName>(event: K, handler: EventHandler<EventPayloads[K]>): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(event)?.delete(handler);
    };
  }

  /**
   * Emit an event to all listeners. A failing listener is logged and does
   * not affect the emitter or the other listeners.
   */
  emit<K extends EventName>(event: K, payload: EventPayloads[K]): void {
    const set = this.handlers.get(event);
    if (!set) return;

    for (const handler of set) {
      const typed = handler as EventHandler<EventPayloads[K]>;
      try {
        const result = typed(payload);
        if (result instanceof Promise) {
          result.catch(error => {
            console.error(`[events] Handler for ${event} failed:`, error);
          });
        }
      } catch (error) {
        console.error(`[events] Handler for ${event} failed:`, error);
      }
    }
  }
}
