/**
 * Session Registry
 * Owns every live session plus a userId -> sessionIds index.
 *
 * - One mutex guards both maps; every critical section is O(1) map work
 *   (the sweep and stats are O(n))
 * - At capacity, the oldest session by createdAt is evicted before inserting
 * - A background sweep removes sessions idle for longer than the timeout
 * - Missing ids are reported as false/null, never thrown
 */

import { v4 as uuidv4 } from 'uuid';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { Mutex } from '../../lib/concurrency/mutex.js';
import { PeriodicTask } from '../../lib/concurrency/periodic-task.js';
import { systemClock, type Clock } from '../../lib/reliability/timeout-guard.js';
import { Session } from './session.js';
import type { SessionMessage, SessionRegistryStats, SessionSummary } from './session.types.js';

/**
 * Result of claiming a session for a stream
 */
export type SessionClaim =
  | { status: 'claimed'; session: Session; created: boolean }
  | { status: 'owner_mismatch'; ownerUserId: string };

export interface SessionRegistryOptions {
  maxSessions: number;
  sessionTimeoutSeconds: number;
  cleanupIntervalSeconds: number;
  clock?: Clock;
  logger?: Logger;
  generateId?: () => string;
}

export class SessionRegistry {
  readonly maxSessions: number;
  readonly sessionTimeoutSeconds: number;
  readonly cleanupIntervalSeconds: number;

  private readonly sessions = new Map<string, Session>();
  private readonly userSessions = new Map<string, Set<string>>();
  private readonly mutex = new Mutex();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly sweeper: PeriodicTask;

  constructor(options: SessionRegistryOptions) {
    if (!(options.maxSessions >= 1)) throw new RangeError('maxSessions must be at least 1');
    if (!(options.sessionTimeoutSeconds > 0)) throw new RangeError('sessionTimeoutSeconds must be positive');

    this.maxSessions = options.maxSessions;
    this.sessionTimeoutSeconds = options.sessionTimeoutSeconds;
    this.cleanupIntervalSeconds = options.cleanupIntervalSeconds;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.generateId = options.generateId ?? uuidv4;

    this.sweeper = new PeriodicTask(
      'session-sweep',
      options.cleanupIntervalSeconds * 1000,
      async () => {
        await this.sweepExpired();
      },
      this.logger
    );
  }

  start(): void {
    this.sweeper.start();
    this.logger.info(
      {
        maxSessions: this.maxSessions,
        sessionTimeoutSeconds: this.sessionTimeoutSeconds,
        cleanupIntervalSeconds: this.cleanupIntervalSeconds,
        event: 'session_registry_started'
      },
      '[SessionRegistry] Started'
    );
  }

  /**
   * Stop the sweep, then remove every session so no consumer stays blocked
   */
  async shutdown(): Promise<void> {
    await this.sweeper.stop();
    const removed = await this.mutex.runExclusive(() => {
      const ids = Array.from(this.sessions.keys());
      for (const sessionId of ids) {
        this.removeLocked(sessionId);
      }
      return ids.length;
    });
    this.logger.info({ removed, event: 'session_registry_shutdown' }, '[SessionRegistry] Shut down');
  }

  /**
   * Create a session, or re-touch it when sessionId already exists.
   * Returns the session id (generated when not supplied).
   */
  async create(userId: string, sessionId?: string, clientIp?: string): Promise<string> {
    return this.mutex.runExclusive(() => this.createLocked(userId, sessionId, clientIp).session.sessionId);
  }

  /**
   * Create or resume a session for userId's stream. An existing id owned by
   * another user is refused. A claimed session counts as one request.
   */
  async claim(userId: string, sessionId?: string, clientIp?: string): Promise<SessionClaim> {
    return this.mutex.runExclusive((): SessionClaim => {
      const existing = sessionId === undefined ? undefined : this.sessions.get(sessionId);
      if (existing && existing.userId !== userId) {
        this.logger.warn(
          { sessionId, ownerUserId: existing.userId, requestedUserId: userId, event: 'session_claim_refused' },
          '[SessionRegistry] Session belongs to another user'
        );
        return { status: 'owner_mismatch', ownerUserId: existing.userId };
      }
      const { session, created } = this.createLocked(userId, sessionId, clientIp);
      if (created) {
        session.touch(this.clock());
      }
      return { status: 'claimed', session, created };
    });
  }

  /**
   * Look up a session. A hit counts as activity.
   */
  async get(sessionId: string): Promise<Session | null> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(sessionId);
      if (!session) return null;
      session.touch(this.clock());
      return session;
    });
  }

  /**
   * Admin view of one session; does not count as activity
   */
  async describe(sessionId: string): Promise<SessionSummary | null> {
    return this.mutex.runExclusive(() => this.sessions.get(sessionId)?.toSummary() ?? null);
  }

  async touch(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(sessionId);
      if (!session) return false;
      session.touch(this.clock());
      return true;
    });
  }

  /**
   * Refresh lastActive for a session with a live stream
   */
  async keepAlive(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(sessionId);
      if (!session) return false;
      session.keepAlive(this.clock());
      return true;
    });
  }

  async remove(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.removeLocked(sessionId));
  }

  async markInitialized(sessionId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(sessionId);
      if (!session) return false;
      session.markInitialized();
      this.logger.debug({ sessionId, event: 'session_initialized' }, '[SessionRegistry] Session marked initialized');
      return true;
    });
  }

  async setMetadata(sessionId: string, key: string, value: unknown): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(sessionId);
      if (!session) return false;
      session.metadata.set(key, value);
      return true;
    });
  }

  async getMetadata(sessionId: string, key: string): Promise<unknown> {
    return this.mutex.runExclusive(() => this.sessions.get(sessionId)?.metadata.get(key));
  }

  async getUserId(sessionId: string): Promise<string | null> {
    return this.mutex.runExclusive(() => this.sessions.get(sessionId)?.userId ?? null);
  }

  async getUserSessions(userId: string): Promise<string[]> {
    return this.mutex.runExclusive(() => Array.from(this.userSessions.get(userId) ?? []));
  }

  /**
   * Enqueue message on every session except the excluded one.
   * Returns how many sessions received it.
   */
  async broadcast(message: SessionMessage, excludeSessionId?: string): Promise<number> {
    return this.mutex.runExclusive(() => {
      let delivered = 0;
      for (const [sessionId, session] of this.sessions) {
        if (sessionId === excludeSessionId) continue;
        try {
          session.queue.put(message);
          delivered++;
        } catch (err) {
          this.logger.error(
            {
              sessionId,
              error: err instanceof Error ? err.message : String(err),
              event: 'broadcast_enqueue_failed'
            },
            '[SessionRegistry] Failed to broadcast message to session'
          );
        }
      }
      this.logger.debug(
        { recipients: delivered, excluded: excludeSessionId ?? null, event: 'message_broadcast' },
        '[SessionRegistry] Message broadcast'
      );
      return delivered;
    });
  }

  async sendTo(sessionId: string, message: SessionMessage): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(sessionId);
      if (!session) {
        this.logger.debug({ sessionId, event: 'send_to_missing_session' }, '[SessionRegistry] Send to unknown session ignored');
        return false;
      }
      try {
        session.queue.put(message);
        return true;
      } catch (err) {
        this.logger.debug(
          {
            sessionId,
            error: err instanceof Error ? err.message : String(err),
            event: 'send_to_closed_session'
          },
          '[SessionRegistry] Send to closing session ignored'
        );
        return false;
      }
    });
  }

  /**
   * Remove every session idle for strictly longer than the timeout.
   * Returns the removed ids.
   */
  async sweepExpired(): Promise<string[]> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      const timeoutMs = this.sessionTimeoutSeconds * 1000;
      const expired: string[] = [];
      for (const [sessionId, session] of this.sessions) {
        if (now - session.lastActive > timeoutMs) {
          expired.push(sessionId);
        }
      }
      for (const sessionId of expired) {
        this.removeLocked(sessionId);
      }
      if (expired.length > 0) {
        this.logger.info(
          { removed: expired.length, remaining: this.sessions.size, event: 'sessions_expired' },
          '[SessionRegistry] Expired sessions removed'
        );
      }
      return expired;
    });
  }

  async list(): Promise<SessionSummary[]> {
    return this.mutex.runExclusive(() => Array.from(this.sessions.values(), s => s.toSummary()));
  }

  async count(): Promise<number> {
    return this.mutex.runExclusive(() => this.sessions.size);
  }

  async stats(): Promise<SessionRegistryStats> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      const sessions = Array.from(this.sessions.values());
      const total = sessions.length;
      const initialized = sessions.filter(s => s.initialized).length;

      const userSessionCounts: Record<string, number> = {};
      for (const [userId, ids] of this.userSessions) {
        userSessionCounts[userId] = ids.size;
      }

      const totalAgeSeconds = sessions.reduce((sum, s) => sum + (now - s.createdAt) / 1000, 0);
      const totalQueued = sessions.reduce((sum, s) => sum + s.queue.size, 0);

      return {
        totalSessions: total,
        totalUsers: this.userSessions.size,
        initializedSessions: initialized,
        uninitializedSessions: total - initialized,
        userSessionCounts,
        averageSessionsPerUser: this.userSessions.size > 0 ? total / this.userSessions.size : 0,
        averageSessionAgeSeconds: total > 0 ? totalAgeSeconds / total : 0,
        totalQueuedMessages: totalQueued,
        maxSessions: this.maxSessions,
        sessionTimeoutSeconds: this.sessionTimeoutSeconds
      };
    });
  }

  /**
   * Check that the table and the user index describe the same sessions
   */
  async isConsistent(): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      let indexed = 0;
      for (const [userId, ids] of this.userSessions) {
        if (ids.size === 0) return false;
        for (const id of ids) {
          if (this.sessions.get(id)?.userId !== userId) return false;
          indexed++;
        }
      }
      return indexed === this.sessions.size;
    });
  }

  private createLocked(userId: string, sessionId?: string, clientIp?: string): { session: Session; created: boolean } {
    const now = this.clock();
    const id = sessionId ?? this.generateId();

    const existing = this.sessions.get(id);
    if (existing) {
      existing.touch(now);
      if (existing.userId !== userId) {
        this.logger.warn(
          { sessionId: id, ownerUserId: existing.userId, requestedUserId: userId, event: 'session_owner_mismatch' },
          '[SessionRegistry] Session exists under another user, keeping original owner'
        );
      } else {
        this.logger.debug({ sessionId: id, userId, event: 'session_retouched' }, '[SessionRegistry] Session already exists');
      }
      return { session: existing, created: false };
    }

    if (this.sessions.size >= this.maxSessions) {
      this.evictOldestLocked();
    }

    const session = new Session(id, userId, now, clientIp ?? null);
    this.sessions.set(id, session);
    let owned = this.userSessions.get(userId);
    if (!owned) {
      owned = new Set();
      this.userSessions.set(userId, owned);
    }
    owned.add(id);

    this.logger.info(
      {
        sessionId: id,
        userId,
        userSessions: owned.size,
        totalSessions: this.sessions.size,
        event: 'session_created'
      },
      '[SessionRegistry] Session created'
    );
    return { session, created: true };
  }

  private removeLocked(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    const owned = this.userSessions.get(session.userId);
    if (owned) {
      owned.delete(sessionId);
      if (owned.size === 0) {
        this.userSessions.delete(session.userId);
      }
    }
    const dropped = session.close();

    this.logger.info(
      {
        sessionId,
        userId: session.userId,
        droppedMessages: dropped,
        totalSessions: this.sessions.size,
        event: 'session_removed'
      },
      '[SessionRegistry] Session removed'
    );
    return true;
  }

  private evictOldestLocked(): void {
    let oldest: Session | undefined;
    for (const session of this.sessions.values()) {
      // Strict comparison keeps the first-inserted session on ties
      if (!oldest || session.createdAt < oldest.createdAt) {
        oldest = session;
      }
    }
    if (!oldest) return;

    this.logger.info(
      { sessionId: oldest.sessionId, userId: oldest.userId, event: 'session_evicted' },
      '[SessionRegistry] Oldest session removed due to limit'
    );
    this.removeLocked(oldest.sessionId);
  }
}
