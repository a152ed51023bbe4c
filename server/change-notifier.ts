/**
 * Change Notifier
 *
 * Registry of connected observers. broadcast() attempts delivery to every
 * observer concurrently; an observer whose delivery fails is removed and the
 * others are unaffected. Best-effort fan-out: no ordering across observers,
 * no redelivery.
 */

import type { ChangeNotification } from '@shared/analytics-types';

export interface ChangeObserver {
  readonly id: string;
  /** Rejects when the message could not be delivered. */
  deliver(message: ChangeNotification): Promise<void>;
}

export interface BroadcastSummary {
  delivered: number;
  removed: string[];
}

export class ChangeNotifier {
  private readonly observers = new Map<string, ChangeObserver>();

  register(observer: ChangeObserver): void {
    this.observers.set(observer.id, observer);
  }

  unregister(id: string): boolean {
    return this.observers.delete(id);
  }

  get size(): number {
    return this.observers.size;
  }

  async broadcast(message: ChangeNotification): Promise<BroadcastSummary> {
    const targets = Array.from(this.observers.values());
    const results = await Promise.allSettled(targets.map((observer) => observer.deliver(message)));

    const summary: BroadcastSummary = { delivered: 0, removed: [] };
    results.forEach((result, index) => {
      const observer = targets[index];
      if (result.status === 'fulfilled') {
        summary.delivered++;
        return;
      }
      // only drop the instance that failed; the id may have been re-registered meanwhile
      if (this.observers.get(observer.id) === observer) {
        this.observers.delete(observer.id);
        summary.removed.push(observer.id);
      }
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      console.warn(`[ws] Dropping observer ${observer.id} after failed ${message.type} delivery: ${reason}`);
    });
    return summary;
  }
}
