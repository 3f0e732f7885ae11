/**
 * SSE Writer Tests
 * Framing, plus SseWriter over real Express responses
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import http from 'node:http';
import { once } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import express from 'express';
import request from 'supertest';
import { formatSseFrame, SseWriter, TransportClosedError } from '../src/infra/sse/sse-writer.js';
import { waitFor } from './helpers/test-helpers.js';

describe('formatSseFrame', () => {
  it('should write id, event, retry and data lines', () => {
    const text = formatSseFrame({ id: '7', event: 'message', data: { a: 1 }, retry: 5000 });
    assert.strictEqual(text, 'id: 7\nevent: message\nretry: 5000\ndata: {"a":1}\n\n');
  });

  it('should omit the id line when there is no id', () => {
    const text = formatSseFrame({ event: 'heartbeat', data: { type: 'heartbeat' }, retry: 1000 });
    assert.strictEqual(text, 'event: heartbeat\nretry: 1000\ndata: {"type":"heartbeat"}\n\n');
  });

  it('should keep multi-line payloads on one data line', () => {
    const text = formatSseFrame({ event: 'message', data: { text: 'line one\nline two' }, retry: 5000 });
    assert.strictEqual(text, 'event: message\nretry: 5000\ndata: {"text":"line one\\nline two"}\n\n');
  });
});

describe('SseWriter', () => {
  let server: http.Server | undefined;

  afterEach(async () => {
    if (server) {
      server.closeAllConnections();
      await new Promise<void>(resolve => server?.close(() => resolve()));
      server = undefined;
    }
  });

  it('should set stream headers and write frames in order', async () => {
    const seen: { afterClose?: unknown } = {};
    const app = express();
    app.get('/stream', (_req, res) => {
      const writer = new SseWriter(res);
      writer.open();
      writer
        .send({ id: '1', event: 'message', data: { n: 1 }, retry: 1000 })
        .then(() => writer.send({ event: 'heartbeat', data: { type: 'heartbeat' }, retry: 1000 }))
        .then(() => {
          writer.close();
          return writer.send({ event: 'message', data: { n: 2 }, retry: 1000 });
        })
        .then(
          () => {
            seen.afterClose = 'sent';
          },
          (err: unknown) => {
            seen.afterClose = err;
          }
        );
    });

    const response = await request(app).get('/stream');

    assert.strictEqual(response.status, 200);
    assert.strictEqual(response.headers['content-type'], 'text/event-stream; charset=utf-8');
    assert.strictEqual(response.headers['cache-control'], 'no-cache, no-transform');
    assert.strictEqual(response.headers['x-accel-buffering'], 'no');
    assert.strictEqual(
      response.text,
      'id: 1\nevent: message\nretry: 1000\ndata: {"n":1}\n\n' +
        'event: heartbeat\nretry: 1000\ndata: {"type":"heartbeat"}\n\n'
    );
    assert.ok(seen.afterClose instanceof TransportClosedError);
  });

  it('should give up a blocked write when its signal aborts', async () => {
    const abort = new AbortController();
    const big = 'x'.repeat(1024 * 1024);
    const stream: { writer?: SseWriter; result?: Promise<unknown> } = {};

    const app = express();
    app.get('/stream', (_req, res) => {
      const sse = new SseWriter(res);
      stream.writer = sse;
      sse.open();
      stream.result = (async () => {
        // Far more than the socket buffers hold for a peer that does not read
        for (let i = 0; i < 64; i++) {
          await sse.send({ event: 'message', data: { big }, retry: 1000 }, abort.signal);
        }
        return 'finished';
      })().catch((err: unknown) => err);
    });

    const listening = app.listen(0, '127.0.0.1');
    server = listening;
    await once(listening, 'listening');
    const address = listening.address();
    assert.ok(address !== null && typeof address === 'object');

    const client = http.get({ host: '127.0.0.1', port: address.port, path: '/stream' }, res => {
      res.pause();
    });
    client.on('error', () => {
      // the server cuts the socket at the end of the test
    });

    await waitFor(() => stream.result !== undefined);
    await delay(200);
    abort.abort();

    assert.ok((await stream.result) instanceof TransportClosedError);
    const { writer } = stream;
    assert.ok(writer);
    assert.strictEqual(writer.closed, false);

    writer.close();
    assert.strictEqual(writer.closed, true);
    client.destroy();
  });
});
