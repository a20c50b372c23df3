import { logger } from '../config/logger';
import type { WorkerConfig } from '../config/dispatch';
import type { NotificationRequestDal } from '../dal/notification-request.dal';
import { errorMessage } from '../domain/errors';
import { systemClock, type Clock } from '../types/common';
import type { RequestLifecycleService } from './request-lifecycle.service';

export interface WorkerRunResult {
  evaluated: number;
  processed: number;
  failed: number;
}

/**
 * Due-request worker: processes scheduled and deferred requests once their
 * time has come, and picks up requests abandoned mid-way.
 */
export class NotificationWorkerService {
  private running = false;
  private pollTimer: NodeJS.Timeout | undefined;
  private pollPromise: Promise<void> | undefined;
  private readonly clock: Clock;

  constructor(
    private readonly requests: NotificationRequestDal,
    private readonly lifecycle: RequestLifecycleService,
    private readonly config: WorkerConfig,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** One pass over due requests. A failing request is logged and skipped. */
  async runOnce(): Promise<WorkerRunResult> {
    const now = this.clock();
    const due = await this.requests.findDue(
      now,
      new Date(now.getTime() - this.config.staleAfterMs),
      this.config.batchSize,
    );
    const result: WorkerRunResult = { evaluated: due.length, processed: 0, failed: 0 };

    for (const request of due) {
      try {
        await this.requests.markPicked(request.id, now);
        await this.lifecycle.process(request.id);
        result.processed++;
      } catch (err) {
        result.failed++;
        logger.error({ requestId: request.id, err: errorMessage(err) }, 'Due request processing failed');
      }
    }

    return result;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info({ pollIntervalMs: this.config.pollIntervalMs }, 'Notification worker started');
    this.pollPromise = this.poll();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = undefined;
    }
    if (this.pollPromise) await this.pollPromise;
    logger.info('Notification worker stopped');
  }

  private async poll(): Promise<void> {
    if (!this.running) return;

    try {
      const result = await this.runOnce();
      if (result.evaluated > 0) logger.debug(result, 'Worker cycle');
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Worker cycle failed');
    }

    if (!this.running) return;
    this.pollTimer = setTimeout(() => {
      this.pollPromise = this.poll();
    }, this.config.pollIntervalMs);
  }
}
