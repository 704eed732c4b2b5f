import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { errorMessage } from '../../common/errors/render-job.errors';
import {
  renderJobsConfig,
  type RenderJobsConfigType,
} from '../../config/render-jobs.config';
import { JobPurgerService } from './job-purger.service';
import { JobStoreService } from './job-store.service';
import { RENDER_CLOCK } from './render-jobs.constants';
import type { Clock } from './render-jobs.types';

const HOUR_MS = 60 * 60_000;

@Injectable()
export class RetentionSweeperService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(RetentionSweeperService.name);
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<string[]> | null = null;

  constructor(
    private readonly store: JobStoreService,
    private readonly purger: JobPurgerService,
    @Inject(RENDER_CLOCK)
    private readonly now: Clock,
    @Inject(renderJobsConfig.KEY)
    private readonly config: RenderJobsConfigType,
  ) {}

  onApplicationBootstrap() {
    this.start();
  }

  onApplicationShutdown() {
    this.stop();
  }

  start() {
    if (this.timer) return;
    this.tick();
    this.timer = setInterval(() => this.tick(), this.config.retention.intervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  getPolicy() {
    return {
      ageHours: this.config.retention.ageHours,
      intervalMs: this.config.retention.intervalMs,
    };
  }

  /**
   * Deletes terminal jobs whose completion is older than the retention age.
   * Returns the ids removed. A cycle already in progress is joined, not repeated.
   */
  sweepOnce(): Promise<string[]> {
    if (!this.running) {
      this.running = this.sweep().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private tick() {
    this.sweepOnce().catch((err: unknown) => {
      this.logger.error(`Error during cleanup: ${errorMessage(err)}`);
    });
  }

  private async sweep() {
    const { ageHours } = this.config.retention;
    const cutoff = new Date(this.now().getTime() - ageHours * HOUR_MS);
    this.logger.log(`Running cleanup task. Deleting jobs older than ${ageHours} hours.`);

    const expired = await this.store.listTerminalOlderThan(cutoff);
    const removed: string[] = [];
    for (const job of expired) {
      try {
        await this.purger.purge(job);
        removed.push(job.id);
        this.logger.log(`Cleaned up job ${job.id}`);
      } catch (err: unknown) {
        this.logger.error(`Failed to clean up job ${job.id}: ${errorMessage(err)}`);
      }
    }
    return removed;
  }
}
