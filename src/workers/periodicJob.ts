import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../utils/logger.js';

/**
 * Runs `task` every `intervalMs` until stopped. A failing cycle is logged and
 * the loop carries on; `stop()` interrupts the sleep and resolves once the loop
 * has exited, after which `start()` may be called again.
 */
export class PeriodicJob {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly task: () => Promise<void>,
    private readonly log: Logger,
  ) {}

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.log.info({ job: this.name, intervalMs: this.intervalMs }, 'Periodic job started');
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    try {
      await loop;
    } finally {
      this.loop = null;
      this.controller = null;
      this.log.info({ job: this.name }, 'Periodic job stopped');
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.task();
      } catch (err) {
        this.log.error({ err, job: this.name }, 'Periodic job cycle failed');
      }
      if (signal.aborted) break;
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }
  }
}
