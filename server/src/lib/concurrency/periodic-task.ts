/**
 * Periodic Task
 * Cancellable background loop: sleep, run, repeat.
 *
 * - Errors from one iteration are logged and the loop keeps going
 * - stop() aborts the current sleep and resolves once the loop has exited
 */

import type { Logger } from '../logger/structured-logger.js';
import { sleep } from '../reliability/timeout-guard.js';

export type PeriodicWork = (signal: AbortSignal) => void | Promise<void>;

export class PeriodicTask {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private iterations = 0;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly work: PeriodicWork,
    private readonly logger: Logger
  ) {
    if (!(intervalMs > 0)) {
      throw new RangeError(`${name}: intervalMs must be positive, got ${intervalMs}`);
    }
  }

  get running(): boolean {
    return this.loop !== null;
  }

  get completedIterations(): number {
    return this.iterations;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);

    this.logger.debug(
      { task: this.name, intervalMs: this.intervalMs, event: 'periodic_task_started' },
      '[PeriodicTask] Started'
    );
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    await loop;

    this.loop = null;
    this.controller = null;
    this.logger.debug(
      { task: this.name, iterations: this.iterations, event: 'periodic_task_stopped' },
      '[PeriodicTask] Stopped'
    );
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const elapsed = await sleep(this.intervalMs, signal);
      if (!elapsed) break;

      try {
        await this.work(signal);
      } catch (err) {
        this.logger.error(
          {
            task: this.name,
            error: err instanceof Error ? err.message : String(err),
            event: 'periodic_task_iteration_failed'
          },
          '[PeriodicTask] Iteration failed, continuing'
        );
      }
      this.iterations++;
    }
  }
}
