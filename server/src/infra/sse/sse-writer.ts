/**
 * SSE Writer
 * Handles SSE header setup and event framing over an Express response
 * Single responsibility: SSE protocol formatting
 */

import type { Response } from 'express';

export class TransportClosedError extends Error {
  constructor(message = 'Transport is closed') {
    super(message);
    this.name = 'TransportClosedError';
  }
}

/**
 * One outbound event. `data` is serialized as single-line JSON.
 */
export interface SseFrame {
  id?: string;
  event: string;
  data: unknown;
  retry: number;
}

/**
 * What the dispatcher writes to. Express responses, or in-memory fakes in tests.
 */
export interface SseTransport {
  readonly closed: boolean;
  /** Commit to streaming (status and headers). Called once the session is claimed. */
  open(): void;
  /** Rejects when the transport closes, or signal aborts, before the frame is flushed */
  send(frame: SseFrame, signal?: AbortSignal): Promise<void>;
  close(): void;
}

export function formatSseFrame(frame: SseFrame): string {
  let out = '';
  if (frame.id !== undefined) {
    out += `id: ${frame.id}\n`;
  }
  out += `event: ${frame.event}\n`;
  out += `retry: ${frame.retry}\n`;
  out += `data: ${JSON.stringify(frame.data)}\n\n`;
  return out;
}

export class SseWriter implements SseTransport {
  /** Set while a write waits for the socket to drain */
  private blocked = false;

  constructor(private readonly res: Response) {}

  get closed(): boolean {
    return this.res.writableEnded || this.res.destroyed;
  }

  /**
   * Set SSE headers. Must be called before the first send.
   */
  open(): void {
    this.res.status(200);
    this.res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    this.res.flushHeaders();
  }

  /**
   * Write one event. Resolves at once unless the socket buffer is full,
   * then waits for 'drain'.
   */
  async send(frame: SseFrame, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      throw new TransportClosedError();
    }
    if (!this.res.write(formatSseFrame(frame), 'utf8')) {
      await this.waitForDrain(signal);
    }
  }

  /**
   * End the response stream. A peer that stopped reading is cut off
   * instead, since end() would wait for it to drain.
   */
  close(): void {
    if (this.closed) return;
    if (this.blocked) {
      this.res.destroy();
    } else {
      this.res.end();
    }
  }

  private waitForDrain(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        this.res.off('drain', onDrain);
        this.res.off('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };
      const onDrain = (): void => {
        this.blocked = false;
        cleanup();
        resolve();
      };
      const onClose = (): void => {
        cleanup();
        reject(new TransportClosedError('Peer closed with a write pending'));
      };
      const onAbort = (): void => {
        cleanup();
        reject(new TransportClosedError('Write aborted'));
      };

      this.blocked = true;
      if (signal?.aborted) {
        onAbort();
        return;
      }
      this.res.on('drain', onDrain);
      this.res.on('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
