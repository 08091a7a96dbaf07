/**
 * Sync scheduler - turns triggers into sync cycles, one at a time
 * @module sync/scheduler
 */

import { Subject, exhaustMap, from, interval, map, merge } from 'rxjs';
import type { Observable, Subscription } from 'rxjs';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SyncResult } from './index.js';

export type SyncTrigger = 'interval' | 'online' | 'manual';

export interface SchedulerConfig {
  /**
   * Milliseconds between periodic cycles
   * @default 300000
   */
  interval?: number;
  /**
   * Emits when connectivity comes back
   */
  online$?: Observable<unknown>;
  logger?: Logger;
}

/**
 * SyncScheduler - interval ticks, connectivity transitions and manual
 * requests share one pipeline; triggers that arrive while a cycle runs
 * are dropped
 */
export class SyncScheduler {
  private requests = new Subject<SyncTrigger>();
  private subscription: Subscription | null = null;
  private config: { interval: number; online$?: Observable<unknown> };
  private logger?: Logger;
  private runSync: () => Promise<SyncResult>;

  constructor(runSync: () => Promise<SyncResult>, config: SchedulerConfig = {}) {
    const { logger, ...rest } = config;
    this.runSync = runSync;
    this.config = { interval: 5 * 60 * 1000, ...rest };
    this.logger = logger?.child({ module: 'scheduler' });
  }

  get isRunning(): boolean {
    return this.subscription !== null;
  }

  start(): void {
    if (this.subscription) {
      return;
    }

    const triggers: Observable<SyncTrigger>[] = [
      this.requests.asObservable(),
      interval(this.config.interval).pipe(map((): SyncTrigger => 'interval')),
    ];
    if (this.config.online$) {
      triggers.push(this.config.online$.pipe(map((): SyncTrigger => 'online')));
    }

    this.subscription = merge(...triggers)
      .pipe(exhaustMap((trigger) => from(this.runCycle(trigger))))
      .subscribe();
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * Ask for a cycle; ignored when the scheduler is stopped or a cycle
   * is already running
   */
  request(): void {
    this.requests.next('manual');
  }

  private async runCycle(trigger: SyncTrigger): Promise<SyncResult | null> {
    try {
      const result = await this.runSync();
      this.logger?.debug({ trigger, status: result.status }, 'scheduled sync finished');
      return result;
    } catch (error) {
      this.logger?.error({ trigger, error: errorMessage(error) }, 'scheduled sync failed');
      return null;
    }
  }
}

