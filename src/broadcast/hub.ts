/**
 * Broadcast Hub
 *
 * In-memory publish/subscribe registry that decouples telemetry producers
 * (ingest loops) from viewer sessions. Payload-agnostic: callers hand in an
 * already-built envelope, the hub serializes it once per publish.
 *
 * Membership is self-healing: a registration whose send() throws or rejects
 * is dropped from the topic and the publish carries on with the rest.
 * Publish delivers to a snapshot taken synchronously, so a subscribe or
 * unsubscribe racing an in-flight publish never changes the set that
 * publish is walking.
 *
 * Emits:
 *   'subscriberDropped' (topic: string, err: Error)
 */

import { EventEmitter } from 'events';
import { BroadcastMessage, serializeMessage } from './messages';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('BroadcastHub');

/** A sink able to receive serialized messages, e.g. one viewer WebSocket. */
export interface Subscriber {
  readonly id: string;
  send(payload: string): void | Promise<void>;
}

export interface SubscriptionHandle {
  readonly topic: string;
  readonly key: number;
}

interface Registration {
  key: number;
  subscriber: Subscriber;
}

export class BroadcastHub extends EventEmitter {
  private registry = new Map<string, Map<number, Registration>>();
  private nextKey = 1;

  /** Register a subscriber on a topic. Every call yields its own delivery. */
  subscribe(topic: string, subscriber: Subscriber): SubscriptionHandle {
    let members = this.registry.get(topic);
    if (!members) {
      members = new Map();
      this.registry.set(topic, members);
    }
    const key = this.nextKey++;
    members.set(key, { key, subscriber });
    log.debug({ topic, subscriber: subscriber.id, count: members.size }, 'Subscribed');
    return { topic, key };
  }

  /** Remove one registration. Safe to call for an already removed handle. */
  unsubscribe(handle: SubscriptionHandle): boolean {
    const members = this.registry.get(handle.topic);
    if (!members) return false;
    const removed = members.delete(handle.key);
    if (members.size === 0) this.registry.delete(handle.topic);
    return removed;
  }

  /** Remove every registration held by a subscriber, across all topics. */
  unsubscribeAll(subscriber: Subscriber): number {
    let removed = 0;
    for (const [topic, members] of this.registry) {
      for (const [key, reg] of members) {
        if (reg.subscriber === subscriber) {
          members.delete(key);
          removed++;
        }
      }
      if (members.size === 0) this.registry.delete(topic);
    }
    return removed;
  }

  /**
   * Deliver a message to every subscriber registered on the topic right now.
   * Resolves to the number of successful deliveries; never rejects.
   */
  async publish(topic: string, message: BroadcastMessage): Promise<number> {
    const members = this.registry.get(topic);
    if (!members || members.size === 0) return 0;

    const snapshot = Array.from(members.values());
    const payload = serializeMessage(message);

    const results = await Promise.allSettled(
      snapshot.map(async (reg) => {
        await reg.subscriber.send(payload);
      }),
    );

    let delivered = 0;
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      const reg = snapshot[i];
      const err = result.reason instanceof Error ? result.reason : new Error(errorMessage(result.reason));
      this.unsubscribe({ topic, key: reg.key });
      log.warn({ topic, subscriber: reg.subscriber.id, error: err.message }, 'Dropped failing subscriber');
      this.emit('subscriberDropped', topic, err);
    });
    return delivered;
  }

  subscriberCount(topic: string): number {
    return this.registry.get(topic)?.size ?? 0;
  }

  topics(): string[] {
    return Array.from(this.registry.keys());
  }

  clear(): void {
    this.registry.clear();
  }
}
