import type { Logger } from '../observability/logger';
import type { CycleOutcome, CycleStatus } from './cycle';
import { delay } from './delay';

export type SchedulerState = 'idle' | 'running';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface CollectorSchedulerOptions {
  intervalMs: number;
  runCycle: () => Promise<CycleOutcome>;
  logger: Logger;
  sleep?: Sleep;
}

export interface SchedulerTotals {
  cycles: number;
  documentsIndexed: number;
  outcomes: Record<CycleStatus | 'crashed', number>;
}

function emptyTotals(): SchedulerTotals {
  return {
    cycles: 0,
    documentsIndexed: 0,
    outcomes: {
      indexed: 0,
      empty: 0,
      fetch_failed: 0,
      delivery_partial: 0,
      delivery_failed: 0,
      crashed: 0
    }
  };
}

/**
 * Drives collection cycles one after another with a fixed sleep in between.
 * The sleep follows every cycle whatever its outcome; aborting the signal
 * ends the loop after the cycle in flight.
 */
export class CollectorScheduler {
  private readonly intervalMs: number;
  private readonly runCycle: () => Promise<CycleOutcome>;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly totals: SchedulerTotals = emptyTotals();
  private currentState: SchedulerState = 'idle';
  private active = false;

  constructor(options: CollectorSchedulerOptions) {
    this.intervalMs = options.intervalMs;
    this.runCycle = options.runCycle;
    this.logger = options.logger.child({ component: 'scheduler' });
    this.sleep = options.sleep ?? delay;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  getTotals(): SchedulerTotals {
    return { ...this.totals, outcomes: { ...this.totals.outcomes } };
  }

  async run(signal: AbortSignal): Promise<SchedulerTotals> {
    if (this.active) {
      throw new Error('CollectorScheduler is already running');
    }
    this.active = true;
    try {
      while (!signal.aborted) {
        await this.runOnce();
        if (signal.aborted) {
          break;
        }
        await this.sleep(this.intervalMs, signal);
      }
    } finally {
      this.active = false;
    }
    return this.getTotals();
  }

  private async runOnce(): Promise<void> {
    this.currentState = 'running';
    this.totals.cycles += 1;
    try {
      const outcome = await this.runCycle();
      this.totals.outcomes[outcome.status] += 1;
      if (outcome.status === 'indexed') {
        this.totals.documentsIndexed += outcome.indexed;
      } else if (outcome.status === 'delivery_partial') {
        this.totals.documentsIndexed += outcome.attempted - outcome.failed;
      }
    } catch (error) {
      this.totals.outcomes.crashed += 1;
      this.logger.error({ err: error }, 'Collection cycle threw unexpectedly');
    } finally {
      this.currentState = 'idle';
    }
  }
}
