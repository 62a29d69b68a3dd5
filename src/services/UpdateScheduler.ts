/**
 * Update Scheduler
 * Runs every updater in turn, then waits for the next tick. Passes never overlap.
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { EventTypes, type EventBus } from '../core/EventBus.js';
import { errorMessage } from '../core/errors.js';
import type { Updater } from '../providers/base/index.js';
import type { UpdatePassResult } from '../types/index.js';

export interface UpdateSchedulerOptions {
  interval: number;
  eventBus?: EventBus;
}

export class UpdateScheduler {
  private logger: Logger;
  private readonly interval: number;
  private readonly eventBus?: EventBus;
  private timer: NodeJS.Timeout | null = null;
  private currentPass: Promise<UpdatePassResult[]> | null = null;
  private running: boolean = false;
  // bumped by start() and stop(); a tick chain from an earlier start ends itself
  private generation: number = 0;

  constructor(
    private readonly updaters: readonly Updater[],
    options: UpdateSchedulerOptions
  ) {
    this.logger = createChildLogger({ service: 'Scheduler' });
    this.interval = options.interval;
    this.eventBus = options.eventBus;
  }

  /**
   * Start the loop: one pass now, then one per interval
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Scheduler already running');
      return;
    }

    this.running = true;
    this.generation += 1;
    this.logger.info({ interval: this.interval, updaters: this.updaters.map((u) => u.name) }, 'Starting update loop');
    void this.tick(this.generation);
  }

  /**
   * Stop scheduling and wait for an in-flight pass
   */
  async stop(): Promise<void> {
    this.running = false;
    this.generation += 1;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.currentPass) {
      this.logger.info('Waiting for the running pass to finish');
      await this.currentPass;
    }

    this.logger.info('Update loop stopped');
  }

  /**
   * Run one pass over all updaters. Resolves once every updater has finished.
   */
  async runOnce(): Promise<UpdatePassResult[]> {
    if (this.currentPass) {
      this.logger.warn('A pass is already running, waiting for it instead of starting another');
      return this.currentPass;
    }

    this.currentPass = this.runUpdaters();
    try {
      return await this.currentPass;
    } finally {
      this.currentPass = null;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  private async tick(generation: number): Promise<void> {
    const startedAt = Date.now();
    await this.runOnce();

    if (!this.running || generation !== this.generation) {
      return;
    }

    const delay = Math.max(0, this.interval - (Date.now() - startedAt));
    this.logger.debug({ nextRunAt: new Date(Date.now() + delay).toISOString() }, 'Next pass scheduled');
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delay);
  }

  private async runUpdaters(): Promise<UpdatePassResult[]> {
    const results: UpdatePassResult[] = [];

    for (const updater of this.updaters) {
      this.logger.info(`${symbols.sync} Updating ${updater.name}...`);

      try {
        results.push(await updater.update());
      } catch (error) {
        this.logger.error({ updater: updater.name, error }, `Update pass failed: ${errorMessage(error)}`);
        this.eventBus?.publish(EventTypes.ERROR_OCCURRED, {
          source: `${updater.name}.update`,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
    }

    return results;
  }
}
