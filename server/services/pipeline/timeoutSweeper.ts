/**
 * Timeout Sweeper - Deadline Monitoring
 *
 * Periodically advances every entity whose live attempt is past its deadline
 * (retry or fail) and every entity that sits idle without an attempt for too
 * long (a crash between a transition and the next dispatch).
 */

import { pipelineLogger } from '../../../services/logger.js';
import type { Ledger } from '../ledger/types.js';
import { errorMessage } from './errors.js';
import type { AdvanceResult } from './scheduler.js';

const log = pipelineLogger.child('TimeoutSweeper');

const DEFAULT_INTERVAL_MS = 15000;
const DEFAULT_STALL_AFTER_MS = 10 * 60 * 1000;
const DEFAULT_BATCH_SIZE = 100;

export interface Advancer {
  advance(entityId: string): Promise<AdvanceResult>;
}

export interface SweeperOptions {
  ledger: Ledger;
  scheduler: Advancer;
  intervalMs?: number;
  stallAfterMs?: number;
  batchSize?: number;
  now?: () => number;
}

export interface SweepReport {
  due: number;
  stalled: number;
  results: Partial<Record<AdvanceResult, number>>;
  errors: number;
}

export class TimeoutSweeper {
  private checkInterval: NodeJS.Timeout | null = null;
  private running: Promise<SweepReport> | null = null;
  private lastRunAt: number | null = null;
  private lastReport: SweepReport | null = null;

  private ledger: Ledger;
  private scheduler: Advancer;
  private intervalMs: number;
  private stallAfterMs: number;
  private batchSize: number;
  private now: () => number;

  constructor(options: SweeperOptions) {
    this.ledger = options.ledger;
    this.scheduler = options.scheduler;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.stallAfterMs = options.stallAfterMs ?? DEFAULT_STALL_AFTER_MS;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
    }

    this.checkInterval = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        log.error('Sweep failed', errorMessage(error));
      });
    }, this.intervalMs);

    log.info(`Timeout sweeper started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
    log.info('Timeout sweeper stopped');
  }

  /**
   * Run one sweep. A call made while a sweep is in progress joins it
   * instead of starting another.
   */
  runOnce(): Promise<SweepReport> {
    if (this.running) return this.running;
    this.running = this.sweep().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async sweep(): Promise<SweepReport> {
    const now = this.now();
    const due = await this.ledger.listDueAttempts(now, this.batchSize);
    const stalled = await this.ledger.listStalled(now - this.stallAfterMs, this.batchSize);

    const report: SweepReport = { due: due.length, stalled: stalled.length, results: {}, errors: 0 };
    const ids = [...new Set([...due, ...stalled])];

    for (const id of ids) {
      try {
        const result = await this.scheduler.advance(id);
        report.results[result] = (report.results[result] ?? 0) + 1;
      } catch (error) {
        report.errors++;
        log.error(`Sweep could not advance ${id}`, errorMessage(error));
      }
    }

    if (ids.length > 0) {
      log.info('Sweep complete', report);
    }
    this.lastRunAt = now;
    this.lastReport = report;
    return report;
  }

  getStatus(): {
    active: boolean;
    intervalMs: number;
    stallAfterMs: number;
    lastRunAt: number | null;
    lastReport: SweepReport | null;
  } {
    return {
      active: this.checkInterval !== null,
      intervalMs: this.intervalMs,
      stallAfterMs: this.stallAfterMs,
      lastRunAt: this.lastRunAt,
      lastReport: this.lastReport,
    };
  }
}
