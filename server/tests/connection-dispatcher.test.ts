/**
 * ConnectionDispatcher Tests
 * In-memory transport; real short poll intervals
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { SessionRegistry } from '../src/services/session/session-registry.js';
import {
  ConnectionDispatcher,
  ConnectionStateMachine,
  InvalidStateTransitionError,
  SessionRejectedError,
  type ConnectionDispatcherOptions
} from '../src/infra/sse/connection-dispatcher.js';
import { FakeTransport, ManualClock, silentLogger, waitFor } from './helpers/test-helpers.js';

describe('ConnectionDispatcher', () => {
  let registry: SessionRegistry;
  let dispatcher: ConnectionDispatcher;

  const build = (overrides: Partial<ConnectionDispatcherOptions> = {}): ConnectionDispatcher =>
    new ConnectionDispatcher({
      registry,
      heartbeatIntervalSeconds: 60,
      retryIntervalMs: 5000,
      pollIntervalMs: 10,
      logger: silentLogger,
      ...overrides
    });

  beforeEach(() => {
    registry = new SessionRegistry({
      maxSessions: 10,
      sessionTimeoutSeconds: 3600,
      cleanupIntervalSeconds: 60,
      logger: silentLogger
    });
    dispatcher = build();
  });

  afterEach(async () => {
    await dispatcher.shutdown();
    await registry.shutdown();
  });

  it('should deliver queued messages in order after the connected event', async () => {
    const transport = new FakeTransport();
    const peer = new AbortController();
    const done = dispatcher.serve({ transport, userId: 'u1', sessionId: 's1', signal: peer.signal });

    await waitFor(() => transport.frames.length === 1);
    await registry.sendTo('s1', { text: 'A' });
    await registry.sendTo('s1', { text: 'B' });
    await waitFor(() => transport.frames.length === 3);
    peer.abort();

    const outcome = await done;
    assert.deepStrictEqual(outcome, { sessionId: 's1', reason: 'disconnected', eventsSent: 3 });
    assert.strictEqual(transport.opened, true);
    assert.deepStrictEqual(transport.frames, [
      { event: 'connected', data: { sessionId: 's1', userId: 'u1' }, retry: 5000 },
      { id: '1', event: 'message', data: { text: 'A' }, retry: 5000 },
      { id: '2', event: 'message', data: { text: 'B' }, retry: 5000 }
    ]);
  });

  it('should remove the session and close the transport on disconnect', async () => {
    const transport = new FakeTransport();
    const peer = new AbortController();
    const done = dispatcher.serve({ transport, userId: 'u1', sessionId: 's1', signal: peer.signal });

    await waitFor(() => transport.frames.length === 1);
    assert.strictEqual(await registry.count(), 1);
    assert.strictEqual(dispatcher.activeConnections, 1);

    peer.abort();
    await done;

    assert.strictEqual(await registry.count(), 0);
    assert.strictEqual(transport.closed, true);
    assert.strictEqual(dispatcher.activeConnections, 0);
  });

  it('should end the stream when the session is removed elsewhere', async () => {
    const transport = new FakeTransport();
    const done = dispatcher.serve({
      transport,
      userId: 'u1',
      sessionId: 's1',
      signal: new AbortController().signal
    });

    await waitFor(() => transport.frames.length === 1);
    await registry.remove('s1');

    const outcome = await done;
    assert.strictEqual(outcome.reason, 'session_closed');
    assert.strictEqual(transport.closed, true);
  });

  it('should isolate a write failure to its own connection', async () => {
    const failing = new FakeTransport();
    const healthy = new FakeTransport();
    const failingDone = dispatcher.serve({ transport: failing, userId: 'u1', sessionId: 'bad', signal: new AbortController().signal });
    const healthyPeer = new AbortController();
    const healthyDone = dispatcher.serve({ transport: healthy, userId: 'u2', sessionId: 'good', signal: healthyPeer.signal });

    await waitFor(() => failing.frames.length === 1 && healthy.frames.length === 1);
    failing.failWith = new Error('socket reset');
    await registry.sendTo('bad', { text: 'lost' });

    const failedOutcome = await failingDone;
    assert.deepStrictEqual(failedOutcome, { sessionId: 'bad', reason: 'write_error', eventsSent: 1 });
    assert.strictEqual(await registry.describe('bad'), null);

    await registry.sendTo('good', { text: 'still here' });
    await waitFor(() => healthy.frames.length === 2);
    assert.deepStrictEqual(healthy.frames[1]?.data, { text: 'still here' });

    healthyPeer.abort();
    assert.strictEqual((await healthyDone).reason, 'disconnected');
  });

  it('should report a failed connected event as a write error', async () => {
    const transport = new FakeTransport();
    transport.failWith = new Error('broken pipe');

    const outcome = await dispatcher.serve({ transport, userId: 'u1', sessionId: 's1', signal: new AbortController().signal });
    assert.deepStrictEqual(outcome, { sessionId: 's1', reason: 'write_error', eventsSent: 0 });
    assert.strictEqual(await registry.count(), 0);
  });

  it('should emit heartbeats on an idle connection', async () => {
    dispatcher = build({ heartbeatIntervalSeconds: 0.03 });
    const transport = new FakeTransport();
    const peer = new AbortController();
    const done = dispatcher.serve({ transport, userId: 'u1', sessionId: 's1', signal: peer.signal });

    await waitFor(() => transport.events().includes('heartbeat'));
    peer.abort();
    await done;

    const heartbeat = transport.frames.find(f => f.event === 'heartbeat');
    assert.ok(heartbeat);
    assert.strictEqual(heartbeat.id, undefined);
    assert.strictEqual(heartbeat.retry, 5000);
    const data = heartbeat.data;
    assert.ok(typeof data === 'object' && data !== null && 'type' in data && 'timestamp' in data);
    assert.strictEqual(data.type, 'heartbeat');
    assert.strictEqual(typeof data.timestamp, 'string');
  });

  it('should number only non-heartbeat events', async () => {
    const transport = new FakeTransport();
    const peer = new AbortController();
    const done = dispatcher.serve({ transport, userId: 'u1', sessionId: 's1', signal: peer.signal });

    await waitFor(() => transport.frames.length === 1);
    await registry.sendTo('s1', { text: 'A' });
    await registry.sendTo('s1', { type: 'heartbeat', timestamp: 'manual' });
    await registry.sendTo('s1', { text: 'B' });
    await waitFor(() => transport.frames.length === 4);
    peer.abort();
    await done;

    assert.deepStrictEqual(transport.frames.map(f => [f.event, f.id]), [
      ['connected', undefined],
      ['message', '1'],
      ['heartbeat', undefined],
      ['message', '2']
    ]);
  });

  it('should refuse a second stream on a session that is already streaming', async () => {
    const owner = new FakeTransport();
    const ownerPeer = new AbortController();
    const ownerDone = dispatcher.serve({ transport: owner, userId: 'alice', sessionId: 's1', signal: ownerPeer.signal });
    await waitFor(() => owner.frames.length === 1);

    const second = new FakeTransport();
    await assert.rejects(
      dispatcher.serve({ transport: second, userId: 'alice', sessionId: 's1', signal: new AbortController().signal }),
      (err: unknown) => err instanceof SessionRejectedError && err.rejection === 'session_in_use' && err.sessionId === 's1'
    );
    assert.strictEqual(second.opened, false);
    assert.strictEqual(second.frames.length, 0);

    for (let n = 0; n < 4; n++) {
      await registry.sendTo('s1', { n });
    }
    await waitFor(() => owner.frames.length === 5);
    assert.deepStrictEqual(
      owner.frames.slice(1).map(f => f.data),
      [{ n: 0 }, { n: 1 }, { n: 2 }, { n: 3 }]
    );
    assert.strictEqual(dispatcher.activeConnections, 1);

    ownerPeer.abort();
    assert.strictEqual((await ownerDone).reason, 'disconnected');
  });

  it('should refuse a session owned by another user without disturbing it', async () => {
    await registry.create('alice', 's2');
    const intruder = new FakeTransport();
    await assert.rejects(
      dispatcher.serve({ transport: intruder, userId: 'mallory', sessionId: 's2', signal: new AbortController().signal }),
      (err: unknown) => err instanceof SessionRejectedError && err.rejection === 'owner_mismatch'
    );
    assert.strictEqual(intruder.opened, false);
    assert.strictEqual(await registry.getUserId('s2'), 'alice');

    // The id is free again for its owner
    const resumed = new FakeTransport();
    const resumedPeer = new AbortController();
    const resumedDone = dispatcher.serve({ transport: resumed, userId: 'alice', sessionId: 's2', signal: resumedPeer.signal });
    await waitFor(() => resumed.frames.length === 1);
    assert.deepStrictEqual(resumed.frames[0]?.data, { sessionId: 's2', userId: 'alice' });
    resumedPeer.abort();
    await resumedDone;
  });

  it('should keep a listening session alive for the expiry sweep', async () => {
    const clock = new ManualClock();
    const clocked = new SessionRegistry({
      maxSessions: 10,
      sessionTimeoutSeconds: 60,
      cleanupIntervalSeconds: 60,
      clock: clock.now,
      logger: silentLogger
    });
    const clockedDispatcher = new ConnectionDispatcher({
      registry: clocked,
      heartbeatIntervalSeconds: 60,
      retryIntervalMs: 5000,
      pollIntervalMs: 10,
      clock: clock.now,
      logger: silentLogger
    });
    const transport = new FakeTransport();
    const peer = new AbortController();
    const done = clockedDispatcher.serve({ transport, userId: 'u1', sessionId: 's1', signal: peer.signal });
    await waitFor(() => transport.frames.length === 1);

    clock.advanceSeconds(50);
    await clocked.sendTo('s1', { text: 'still listening' });
    const deliveredAt = new Date(clock.nowMs).toISOString();
    await waitFor(async () => (await clocked.describe('s1'))?.lastActive === deliveredAt);

    clock.advanceSeconds(50);
    assert.deepStrictEqual(await clocked.sweepExpired(), []);
    assert.ok(await clocked.describe('s1'));

    peer.abort();
    await done;
    await clockedDispatcher.shutdown();
    await clocked.shutdown();
  });

  it('should close every connection on shutdown and refuse new ones', async () => {
    const first = new FakeTransport();
    const second = new FakeTransport();
    const firstDone = dispatcher.serve({ transport: first, userId: 'u1', sessionId: 's1', signal: new AbortController().signal });
    const secondDone = dispatcher.serve({ transport: second, userId: 'u2', sessionId: 's2', signal: new AbortController().signal });
    await waitFor(() => first.frames.length === 1 && second.frames.length === 1);

    await dispatcher.shutdown();

    assert.strictEqual((await firstDone).reason, 'shutdown');
    assert.strictEqual((await secondDone).reason, 'shutdown');
    assert.strictEqual(dispatcher.activeConnections, 0);
    assert.strictEqual(await registry.count(), 0);

    const late = new FakeTransport();
    const lateOutcome = await dispatcher.serve({ transport: late, userId: 'u3', sessionId: 's3', signal: new AbortController().signal });
    assert.deepStrictEqual(lateOutcome, { sessionId: 's3', reason: 'shutdown', eventsSent: 0 });
    assert.strictEqual(late.closed, true);
    assert.strictEqual(await registry.count(), 0);
  });
});

describe('ConnectionStateMachine', () => {
  it('should follow CONNECTING -> STREAMING -> CLOSED', () => {
    const machine = new ConnectionStateMachine();
    assert.strictEqual(machine.state, 'CONNECTING');
    machine.transition('STREAMING');
    machine.transition('CLOSED');
    assert.strictEqual(machine.state, 'CLOSED');
  });

  it('should allow closing before streaming', () => {
    const machine = new ConnectionStateMachine();
    machine.transition('CLOSED');
    assert.strictEqual(machine.state, 'CLOSED');
  });

  it('should reject illegal transitions', () => {
    const machine = new ConnectionStateMachine();
    machine.transition('STREAMING');
    machine.transition('CLOSED');

    assert.throws(() => machine.transition('STREAMING'), InvalidStateTransitionError);
    assert.throws(() => new ConnectionStateMachine().transition('CONNECTING'), InvalidStateTransitionError);
  });
});
