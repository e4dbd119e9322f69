import { clearInterval, clearTimeout, setInterval, setTimeout } from "node:timers";
import type { ProgressEvent } from "../shared/types.js";
import { DeliveryFailure } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";

/**
 * Writes one event to a subscriber's connection. Throwing (or rejecting) marks the
 * subscriber as dead; the broker then drops it.
 */
export type SendFn = (event: ProgressEvent) => void | Promise<void>;

/** Options passed to {@link ProgressBroker.register}. */
export type RegisterOptions = {
  /**
   * Called when the broker drops the subscriber on its own (failed delivery or idle
   * eviction). The transport should close the underlying connection. Not called on
   * an explicit {@link ProgressBroker.unregister}.
   */
  close?: () => void;
};

/** @internal */
type Subscriber = {
  clientId: string;
  taskId: string;
  send: SendFn;
  close?: () => void;
  lastActive: number;
};

/** Options for the {@link ProgressBroker} constructor. */
export type ProgressBrokerOptions = {
  /** Clock used for `lastActive` bookkeeping. @default Date.now */
  now?: () => number;
  /**
   * A send still pending after this many ms counts as a failed delivery and the
   * subscriber is dropped. @default 10_000
   */
  sendTimeout?: number;
  logger?: Logger;
};

/** Options for {@link ProgressBroker.startEviction}. */
export type EvictionOptions = {
  /** Subscribers silent for longer than this many ms are evicted. */
  idleTimeout: number;
  /** Interval in ms between eviction sweeps. */
  interval: number;
};

/**
 * Per-task publish/subscribe registry. Each task id maps to the live subscribers
 * attached to it; {@link broadcast} fans one event out to all of them.
 *
 * Structural changes (register, unregister, bucket creation and removal) are
 * synchronous. Delivery happens afterwards against a snapshot, so a slow
 * subscriber never holds up registry changes or other tasks, and a send that
 * outlives `sendTimeout` is treated as a failure. Delivery is
 * best-effort: a subscriber that registers while a broadcast is in flight
 * may miss that one event, and a failed delivery drops the subscriber.
 *
 * @example
 * ```ts
 * const broker = new ProgressBroker();
 * broker.register(taskId, clientId, (event) => socket.send(JSON.stringify(event)), {
 *   close: () => socket.close(),
 * });
 * const stop = broker.startEviction({ idleTimeout: 90_000, interval: 30_000 });
 * ```
 */
export class ProgressBroker {
  private buckets = new Map<string, Map<string, Subscriber>>();
  private evictionTimers = new Set<ReturnType<typeof setInterval>>();
  private now: () => number;
  private sendTimeout: number;
  private log: Logger;

  constructor(options: ProgressBrokerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sendTimeout = options.sendTimeout ?? 10_000;
    this.log = options.logger ?? getLogger({ module: "ProgressBroker" });
  }

  /**
   * Attach a subscriber to a task. Creates the task's bucket if absent. A second
   * registration under the same client id replaces the first.
   */
  register(taskId: string, clientId: string, send: SendFn, options: RegisterOptions = {}): void {
    let bucket = this.buckets.get(taskId);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(taskId, bucket);
    }
    bucket.set(clientId, { clientId, taskId, send, close: options.close, lastActive: this.now() });
    this.log.debug({ taskId, clientId, subscribers: bucket.size }, "Subscriber registered");
  }

  /**
   * Detach a subscriber. Removes the task's bucket once it is empty. Unknown
   * subscribers are ignored.
   *
   * @returns `true` if a subscriber was removed.
   */
  unregister(taskId: string, clientId: string): boolean {
    const bucket = this.buckets.get(taskId);
    if (!bucket?.delete(clientId)) return false;

    if (bucket.size === 0) this.buckets.delete(taskId);
    this.log.debug({ taskId, clientId }, "Subscriber unregistered");
    return true;
  }

  /**
   * Record a heartbeat from a subscriber.
   *
   * @returns `false` if the subscriber is not registered.
   */
  touch(taskId: string, clientId: string): boolean {
    const subscriber = this.buckets.get(taskId)?.get(clientId);
    if (!subscriber) return false;
    subscriber.lastActive = this.now();
    return true;
  }

  /**
   * Deliver an event to every subscriber of a task registered at call time.
   * Per-subscriber failures are isolated: the failing subscriber is dropped and
   * delivery to the rest continues. Never rejects.
   *
   * @returns The number of successful deliveries.
   */
  async broadcast(taskId: string, event: ProgressEvent): Promise<number> {
    const bucket = this.buckets.get(taskId);
    if (!bucket || bucket.size === 0) return 0;

    const snapshot = Array.from(bucket.values());
    const outcomes = await Promise.all(snapshot.map((subscriber) => this.deliver(subscriber, event)));
    return outcomes.filter(Boolean).length;
  }

  /**
   * Deliver an event to a single subscriber, with the same failure handling as {@link broadcast}.
   *
   * @returns `false` if the subscriber is unknown or delivery failed.
   */
  async sendToClient(taskId: string, clientId: string, event: ProgressEvent): Promise<boolean> {
    const subscriber = this.buckets.get(taskId)?.get(clientId);
    if (!subscriber) return false;
    return this.deliver(subscriber, event);
  }

  /**
   * Drop every subscriber whose last activity is older than `timeout` ms.
   *
   * @returns The number of subscribers evicted.
   */
  evictIdle(timeout: number, now: number = this.now()): number {
    const stale: Subscriber[] = [];
    for (const bucket of this.buckets.values()) {
      for (const subscriber of bucket.values()) {
        if (now - subscriber.lastActive > timeout) stale.push(subscriber);
      }
    }

    for (const subscriber of stale) {
      this.drop(subscriber);
      this.log.warn(
        { taskId: subscriber.taskId, clientId: subscriber.clientId, idleMs: now - subscriber.lastActive },
        "Evicted idle subscriber",
      );
    }
    return stale.length;
  }

  /**
   * Run {@link evictIdle} periodically. The timer does not keep the process alive.
   *
   * @returns A function that stops the sweeps.
   */
  startEviction(options: EvictionOptions): () => void {
    const timer = setInterval(() => {
      this.evictIdle(options.idleTimeout);
    }, options.interval);
    timer.unref();
    this.evictionTimers.add(timer);

    return () => {
      clearInterval(timer);
      this.evictionTimers.delete(timer);
    };
  }

  /** Client ids currently attached to a task. */
  getTaskClients(taskId: string): string[] {
    return Array.from(this.buckets.get(taskId)?.keys() ?? []);
  }

  /** Task ids with at least one live subscriber. */
  getConnectedTasks(): string[] {
    return Array.from(this.buckets.keys());
  }

  getTotalConnections(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.size;
    return total;
  }

  /**
   * Stop eviction sweeps and forget every subscriber. No close callbacks fire;
   * connections belong to the transport.
   */
  dispose(): void {
    for (const timer of this.evictionTimers) clearInterval(timer);
    this.evictionTimers.clear();
    this.buckets.clear();
  }

  private async deliver(subscriber: Subscriber, event: ProgressEvent): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Send timed out after ${this.sendTimeout}ms`)), this.sendTimeout);
    });

    try {
      await Promise.race([subscriber.send(event), timeout]);
      subscriber.lastActive = this.now();
      return true;
    } catch (error) {
      const failure = new DeliveryFailure(subscriber.taskId, subscriber.clientId, error);
      this.log.warn({ err: failure, taskId: subscriber.taskId, clientId: subscriber.clientId }, "Dropping subscriber");
      this.drop(subscriber);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Remove a subscriber if this exact handle is still registered, then close it. */
  private drop(subscriber: Subscriber): void {
    const bucket = this.buckets.get(subscriber.taskId);
    if (bucket?.get(subscriber.clientId) !== subscriber) return;

    this.unregister(subscriber.taskId, subscriber.clientId);
    try {
      subscriber.close?.();
    } catch (error) {
      this.log.warn({ err: error, taskId: subscriber.taskId, clientId: subscriber.clientId }, "Subscriber close failed");
    }
  }
}
