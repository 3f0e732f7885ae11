/**
 * Connection Dispatcher
 * Per-connection loop that drains one session's queue onto a live SSE transport.
 *
 * Lifecycle: CONNECTING -> STREAMING -> CLOSED
 * - CONNECTING: claim the session (one live stream per session, owner only)
 * - STREAMING: read loop plus a heartbeat task for idle connections
 * - CLOSED: heartbeat stopped, session removed, transport ended
 *
 * A write failure ends only the connection it happened on.
 */

import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { QueueClosedError } from '../../lib/concurrency/async-queue.js';
import { PeriodicTask } from '../../lib/concurrency/periodic-task.js';
import { systemClock, type Clock } from '../../lib/reliability/timeout-guard.js';
import type { SessionRegistry } from '../../services/session/session-registry.js';
import type { Session } from '../../services/session/session.js';
import type { SessionMessage } from '../../services/session/session.types.js';
import type { SseFrame, SseTransport } from './sse-writer.js';

export type ConnectionState = 'CONNECTING' | 'STREAMING' | 'CLOSED';

export type CloseReason = 'disconnected' | 'session_closed' | 'write_error' | 'shutdown';

export interface ConnectionOutcome {
  sessionId: string;
  reason: CloseReason;
  /** Frames written, including the connected event and heartbeats */
  eventsSent: number;
}

export interface ServeOptions {
  transport: SseTransport;
  userId: string;
  sessionId?: string;
  clientIp?: string;
  /** Aborts when the peer goes away */
  signal: AbortSignal;
}

export interface ConnectionDispatcherOptions {
  registry: SessionRegistry;
  heartbeatIntervalSeconds: number;
  retryIntervalMs: number;
  pollIntervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

export type SessionRejection = 'session_in_use' | 'owner_mismatch';

/**
 * Thrown by serve() before the transport is opened
 */
export class SessionRejectedError extends Error {
  constructor(
    public readonly sessionId: string,
    public readonly rejection: SessionRejection
  ) {
    super(
      rejection === 'session_in_use'
        ? `Session ${sessionId} already has a live stream`
        : `Session ${sessionId} belongs to another user`
    );
    this.name = 'SessionRejectedError';
  }
}

export class InvalidStateTransitionError extends Error {
  constructor(
    public readonly from: ConnectionState,
    public readonly to: ConnectionState
  ) {
    super(`Invalid connection state transition: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  CONNECTING: ['STREAMING', 'CLOSED'],
  STREAMING: ['CLOSED'],
  CLOSED: []
};

export function isHeartbeat(message: SessionMessage): boolean {
  return message['type'] === 'heartbeat';
}

/**
 * Tracks one connection's state. Illegal moves throw.
 */
export class ConnectionStateMachine {
  private current: ConnectionState = 'CONNECTING';

  get state(): ConnectionState {
    return this.current;
  }

  transition(to: ConnectionState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    this.current = to;
  }
}

interface ConnectionHandle {
  controller: AbortController;
  shutdownRequested: boolean;
  /** Session this connection holds in activeSessions, once known */
  sessionId: string | null;
}

function abortReason(handle: ConnectionHandle): CloseReason {
  return handle.shutdownRequested ? 'shutdown' : 'disconnected';
}

export class ConnectionDispatcher {
  private readonly registry: SessionRegistry;
  private readonly heartbeatIntervalMs: number;
  private readonly retryIntervalMs: number;
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly inFlight = new Map<ConnectionHandle, Promise<ConnectionOutcome>>();
  private readonly activeSessions = new Set<string>();
  private closing = false;

  constructor(options: ConnectionDispatcherOptions) {
    if (!(options.heartbeatIntervalSeconds > 0)) throw new RangeError('heartbeatIntervalSeconds must be positive');
    if (!(options.pollIntervalMs > 0)) throw new RangeError('pollIntervalMs must be positive');

    this.registry = options.registry;
    this.heartbeatIntervalMs = options.heartbeatIntervalSeconds * 1000;
    this.retryIntervalMs = options.retryIntervalMs;
    this.pollIntervalMs = options.pollIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  get activeConnections(): number {
    return this.inFlight.size;
  }

  /**
   * Serve one connection until the peer leaves, the session is closed,
   * a write fails or the dispatcher shuts down.
   * Rejects with SessionRejectedError, transport unopened, when the session
   * already streams elsewhere or belongs to another user.
   */
  serve(options: ServeOptions): Promise<ConnectionOutcome> {
    const requested = options.sessionId;
    if (requested !== undefined) {
      if (this.activeSessions.has(requested)) {
        this.logger.warn(
          { sessionId: requested, userId: options.userId, event: 'sse_session_in_use' },
          '[SSE] Session already has a live stream'
        );
        return Promise.reject(new SessionRejectedError(requested, 'session_in_use'));
      }
      this.activeSessions.add(requested);
    }

    const handle: ConnectionHandle = {
      controller: new AbortController(),
      shutdownRequested: false,
      sessionId: requested ?? null
    };
    const done = this.run(handle, options).finally(() => {
      this.inFlight.delete(handle);
      if (handle.sessionId !== null) {
        this.activeSessions.delete(handle.sessionId);
      }
    });
    this.inFlight.set(handle, done);
    return done;
  }

  /**
   * Abort every live connection and wait for each to finish closing
   */
  async shutdown(): Promise<void> {
    this.closing = true;
    const pending = Array.from(this.inFlight.entries());
    for (const [handle] of pending) {
      handle.shutdownRequested = true;
      handle.controller.abort();
    }
    await Promise.allSettled(pending.map(([, done]) => done));
    this.logger.info({ closed: pending.length, event: 'dispatcher_shutdown' }, '[SSE] Dispatcher shut down');
  }

  private async run(handle: ConnectionHandle, options: ServeOptions): Promise<ConnectionOutcome> {
    const { transport, userId, signal } = options;
    const machine = new ConnectionStateMachine();
    const onPeerAbort = (): void => handle.controller.abort();
    signal.addEventListener('abort', onPeerAbort, { once: true });
    if (signal.aborted) handle.controller.abort();

    if (this.closing) {
      handle.shutdownRequested = true;
      machine.transition('CLOSED');
      signal.removeEventListener('abort', onPeerAbort);
      transport.close();
      return { sessionId: options.sessionId ?? '', reason: 'shutdown', eventsSent: 0 };
    }

    const claim = await this.registry.claim(userId, options.sessionId, options.clientIp);
    if (claim.status === 'owner_mismatch') {
      signal.removeEventListener('abort', onPeerAbort);
      throw new SessionRejectedError(options.sessionId ?? '', 'owner_mismatch');
    }
    const { session } = claim;
    const { sessionId } = session;
    if (handle.sessionId === null) {
      handle.sessionId = sessionId;
      this.activeSessions.add(sessionId);
    }
    transport.open();

    let eventsSent = 0;
    let lastSentAt = this.clock();
    let reason: CloseReason;
    let heartbeat: PeriodicTask | null = null;

    const send = async (frame: SseFrame): Promise<void> => {
      await transport.send(frame, handle.controller.signal);
      eventsSent++;
      lastSentAt = this.clock();
      // A listening client stays live for the expiry sweep
      await this.registry.keepAlive(sessionId);
    };

    try {
      machine.transition('STREAMING');
      this.logger.info({ sessionId, userId, event: 'sse_connection_opened' }, '[SSE] Connection streaming');

      heartbeat = this.startHeartbeat(session, () => lastSentAt);
      reason = await this.stream(session, handle, send);
    } finally {
      if (heartbeat) {
        await heartbeat.stop();
      }
      signal.removeEventListener('abort', onPeerAbort);
      await this.registry.remove(sessionId);
      transport.close();
      machine.transition('CLOSED');
    }

    this.logger.info(
      { sessionId, userId, reason, eventsSent, event: 'sse_connection_closed' },
      '[SSE] Connection closed'
    );
    return { sessionId, reason, eventsSent };
  }

  private async stream(
    session: Session,
    handle: ConnectionHandle,
    send: (frame: SseFrame) => Promise<void>
  ): Promise<CloseReason> {
    const { signal } = handle.controller;
    const retry = this.retryIntervalMs;
    // Event ids number delivered messages only
    let nextId = 1;

    try {
      await send({ event: 'connected', data: { sessionId: session.sessionId, userId: session.userId }, retry });
    } catch (err) {
      if (signal.aborted) return abortReason(handle);
      this.logWriteError(session.sessionId, err);
      return 'write_error';
    }

    for (;;) {
      if (signal.aborted) {
        return abortReason(handle);
      }

      const result = await session.queue.get(this.pollIntervalMs, signal);
      if (result.status === 'timeout') continue;
      if (result.status === 'closed') return 'session_closed';

      const message = result.item;
      let frame: SseFrame;
      if (isHeartbeat(message)) {
        frame = { event: 'heartbeat', data: message, retry };
      } else {
        frame = { id: String(nextId), event: 'message', data: message, retry };
        nextId++;
      }

      try {
        await send(frame);
      } catch (err) {
        // A send cut short by shutdown or the peer leaving is not a write error
        if (signal.aborted) return abortReason(handle);
        this.logWriteError(session.sessionId, err);
        return 'write_error';
      }
    }
  }

  /**
   * Enqueue a heartbeat whenever a full interval passed without any event
   */
  private startHeartbeat(session: Session, lastSentAt: () => number): PeriodicTask {
    const task = new PeriodicTask(
      `heartbeat:${session.sessionId}`,
      this.heartbeatIntervalMs,
      () => {
        const now = this.clock();
        if (now - lastSentAt() < this.heartbeatIntervalMs) return;
        try {
          session.queue.put({ type: 'heartbeat', timestamp: new Date(now).toISOString() });
        } catch (err) {
          if (!(err instanceof QueueClosedError)) throw err;
          this.logger.debug(
            { sessionId: session.sessionId, event: 'sse_heartbeat_skipped' },
            '[SSE] Heartbeat skipped, session queue closed'
          );
        }
      },
      this.logger
    );
    task.start();
    return task;
  }

  private logWriteError(sessionId: string, err: unknown): void {
    this.logger.warn(
      {
        sessionId,
        error: err instanceof Error ? err.message : String(err),
        event: 'sse_write_failed'
      },
      '[SSE] Write failed, closing connection'
    );
  }
}
