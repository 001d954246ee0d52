import { ReportLifecycle, SweepResult } from '../services/reportLifecycle';
import { JobLock, withJobLock } from '../utils/jobLock';
import { workerLogger } from '../utils/logger';

export const SWEEP_LOCK_KEY = 'locks:confirmation-sweep';

export interface SweeperOptions {
  intervalMs: number;
  lockTtlMs?: number;
}

/**
 * Periodic auto-confirmation of reports past their confirmation deadline.
 * Each run holds a shared lock so runs never overlap, across processes
 * as well as within one.
 */
export class ConfirmationSweeper {
  private timer: NodeJS.Timeout | null = null;
  private readonly lockTtlMs: number;

  constructor(
    private readonly lifecycle: ReportLifecycle,
    private readonly lock: JobLock,
    private readonly options: SweeperOptions
  ) {
    this.lockTtlMs = options.lockTtlMs ?? 5 * 60 * 1000;
  }

  runOnce(): Promise<{ acquired: true; result: SweepResult } | { acquired: false }> {
    return withJobLock(this.lock, SWEEP_LOCK_KEY, this.lockTtlMs, () => this.lifecycle.sweepExpiredConfirmations());
  }

  start(): void {
    if (this.timer) return;
    workerLogger.info({ intervalMs: this.options.intervalMs }, '⚙️ Starting confirmation sweeper');

    this.timer = setInterval(() => {
      this.runOnce()
        .then((outcome) => {
          if (!outcome.acquired) {
            workerLogger.debug('Sweep skipped, lock held elsewhere');
          }
        })
        .catch((error: unknown) => {
          workerLogger.error({ err: error }, 'Confirmation sweep failed');
        });
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
