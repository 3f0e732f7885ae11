/**
 * Session
 * One client's logical identity plus its outbound queue.
 *
 * Any holder may enqueue; only the dispatcher serving this session's
 * connection drains the queue.
 */

import { AsyncQueue } from '../../lib/concurrency/async-queue.js';
import type { SessionMessage, SessionSummary } from './session.types.js';

export class Session {
  readonly queue = new AsyncQueue<SessionMessage>();
  readonly metadata = new Map<string, unknown>();
  private _lastActive: number;
  private _requestCount = 0;
  private _initialized = false;

  constructor(
    readonly sessionId: string,
    readonly userId: string,
    readonly createdAt: number,
    readonly clientIp: string | null = null
  ) {
    this._lastActive = createdAt;
  }

  get lastActive(): number {
    return this._lastActive;
  }

  get requestCount(): number {
    return this._requestCount;
  }

  get initialized(): boolean {
    return this._initialized;
  }

  /**
   * Record activity. lastActive never moves backwards.
   */
  touch(now: number): void {
    this._lastActive = Math.max(this._lastActive, now);
    this._requestCount++;
  }

  /**
   * Record liveness without counting a request
   */
  keepAlive(now: number): void {
    this._lastActive = Math.max(this._lastActive, now);
  }

  markInitialized(): void {
    this._initialized = true;
  }

  /**
   * Discard anything queued and wake the consumer
   */
  close(): number {
    const dropped = this.queue.drain().length;
    this.queue.close();
    return dropped;
  }

  toSummary(): SessionSummary {
    return {
      sessionId: this.sessionId,
      userId: this.userId,
      clientIp: this.clientIp,
      createdAt: new Date(this.createdAt).toISOString(),
      lastActive: new Date(this._lastActive).toISOString(),
      requestCount: this._requestCount,
      queueSize: this.queue.size,
      initialized: this._initialized,
      metadata: Object.fromEntries(this.metadata)
    };
  }
}
