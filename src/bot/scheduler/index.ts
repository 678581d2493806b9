import { Logger, childLogger } from '../../utils/logger';

export const DEADLINE_CHECK_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface SchedulerConfig {
  intervalMs?: number;
  task: () => Promise<unknown>;
  logger?: Logger;
}

/**
 * Runs `task` once on start and then on a fixed interval. A tick that lands
 * while the previous run is still in flight is dropped.
 */
export class DeadlineScheduler {
  private timer: NodeJS.Timeout | null = null;
  private isProcessing = false;
  private readonly intervalMs: number;
  private readonly logger: Logger;

  constructor(private readonly config: SchedulerConfig) {
    this.intervalMs = config.intervalMs ?? DEADLINE_CHECK_INTERVAL_MS;
    this.logger = config.logger ?? childLogger('scheduler');
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get busy(): boolean {
    return this.isProcessing;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, 'deadline check scheduled');
    void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Resolves once this tick's run (if any) has finished; never rejects. */
  async tick(): Promise<void> {
    if (this.isProcessing) {
      this.logger.warn('previous deadline check still running; skipping this tick');
      return;
    }
    this.isProcessing = true;
    try {
      await this.config.task();
    } catch (e) {
      this.logger.error({ err: e }, 'Error in deadline check task');
    } finally {
      this.isProcessing = false;
    }
  }
}

export function startScheduler(config: SchedulerConfig): DeadlineScheduler {
  const scheduler = new DeadlineScheduler(config);
  scheduler.start();
  return scheduler;
}
