/**
 * Sync Bus
 *
 * Minimal publish/subscribe used to share master targets between cameras.
 * Subscriptions match by topic prefix. Every message carries an id so bridges
 * can drop messages they have already relayed.
 */

import { EventEmitter } from "events";
import { nanoid } from "nanoid";

export interface SyncMessage {
  id: string;
  topic: string;
  payload: unknown;
}

export type SyncHandler = (message: SyncMessage) => void;

export interface SyncBus {
  publish(topic: string, payload: unknown): void;
  /** Returns the unsubscribe function */
  subscribe(topicPrefix: string, handler: SyncHandler): () => void;
  close(): Promise<void>;
}

export class LocalSyncBus implements SyncBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(topic: string, payload: unknown): void {
    this.deliver({ id: nanoid(), topic, payload });
  }

  /**
   * Deliver a message that already has an id (from a bridge)
   */
  deliver(message: SyncMessage): void {
    this.emitter.emit("message", message);
  }

  subscribe(topicPrefix: string, handler: SyncHandler): () => void {
    const listener = (message: SyncMessage) => {
      if (message.topic.startsWith(topicPrefix)) handler(message);
    };
    this.emitter.on("message", listener);
    return () => {
      this.emitter.off("message", listener);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount("message");
  }

  async close(): Promise<void> {
    this.emitter.removeAllListeners();
  }
}
