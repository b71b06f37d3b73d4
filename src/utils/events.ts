import { EventEmitter as NodeEventEmitter } from "events";
import logger from "./logger";

/**
 * Event Map defining all system events and their payloads
 */
export interface EventMap {
  "listing:sold": {
    listingId: string;
    eventId: string;
    checkoutSessionId: string | null;
    buyerEmail: string | null;
    soldAt: Date;
  };
  "account:registered": {
    accountId: string;
    username: string;
  };
  "account:password_reset": {
    accountId: string;
    username: string;
  };
}

/**
 * Typed EventEmitter for decoupled side-effects
 */
export class TypedEventEmitter {
  private emitter = new NodeEventEmitter();

  /**
   * Emit an event with its typed payload
   */
  emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
    logger.debug("Event emitted", { event, data });
    this.emitter.emit(event, data);
  }

  /**
   * Subscribe to an event with a typed handler
   * Supports both sync and async handlers with automatic error isolation
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (data: EventMap[K]) => void | Promise<void>
  ): void {
    this.emitter.on(event, async (data: EventMap[K]) => {
      try {
        await handler(data);
      } catch (error) {
        logger.error(`Error in event handler for "${event}"`, {
          event,
          error: error instanceof Error ? error.message : error,
        });
      }
    });
  }
}

// Export singleton instance
export const events = new TypedEventEmitter();
