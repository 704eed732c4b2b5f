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
import { ArtifactsService } from './artifacts.service';
import type { RenderJob } from './entities/render-job.entity';
import { JobPurgerService } from './job-purger.service';
import { JobStoreService } from './job-store.service';
import { WebhookNotifierService } from './notifications/webhook-notifier.service';
import { WorkQueue } from './queue/work-queue';
import type { Renderer } from './renderer/renderer.interface';
import {
  COMPLETED_MESSAGE,
  INTERRUPTED_MESSAGE,
  PROCESSING_MESSAGE,
  RENDERER,
  RENDER_JOB_QUEUE,
} from './render-jobs.constants';
import type { PublishedOutputs } from './render-jobs.types';

/**
 * Fixed-size pool of workers draining the render queue. A job id belongs to
 * the worker that dequeued it until the job is terminal; nothing else writes
 * its status.
 */
@Injectable()
export class WorkerPoolService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(WorkerPoolService.name);
  private readonly claimed = new Set<string>();
  private readonly pendingDeletion = new Set<string>();
  private readonly inflight = new Map<string, AbortController>();
  private readonly notifications = new Set<Promise<boolean>>();
  private loops: Promise<void>[] = [];
  private running = false;

  constructor(
    @Inject(RENDER_JOB_QUEUE)
    private readonly queue: WorkQueue<string>,
    @Inject(RENDERER)
    private readonly renderer: Renderer,
    private readonly store: JobStoreService,
    private readonly artifacts: ArtifactsService,
    private readonly purger: JobPurgerService,
    private readonly notifier: WebhookNotifierService,
    @Inject(renderJobsConfig.KEY)
    private readonly config: RenderJobsConfigType,
  ) {}

  async onApplicationBootstrap() {
    await this.recoverInterruptedJobs();
    this.start();
  }

  onApplicationShutdown() {
    return this.stop();
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.queue.reopen();

    const size = Math.max(1, this.config.workerConcurrency);
    this.loops = Array.from({ length: size }, (_, i) => this.runLoop(i + 1));
    this.logger.log(`Started ${size} render worker(s)`);
  }

  /** Stops taking work, kills running renders and waits for workers to exit. */
  async stop() {
    if (!this.running) return;
    this.running = false;
    this.queue.close();
    for (const controller of this.inflight.values()) controller.abort();

    await Promise.all(this.loops);
    await Promise.all([...this.notifications]);
    this.loops = [];
  }

  enqueue(jobId: string) {
    this.queue.push(jobId);
  }

  isClaimed(jobId: string) {
    return this.claimed.has(jobId);
  }

  /**
   * Hands deletion of a job that is not terminal yet to its owner. The job is
   * purged when it is dequeued, or right after it reaches a terminal state.
   */
  deferDeletion(jobId: string) {
    this.pendingDeletion.add(jobId);
  }

  isDeletionPending(jobId: string) {
    return this.pendingDeletion.has(jobId);
  }

  /** Withdraws a deferred deletion; true if it was still pending. */
  takeDeferredDeletion(jobId: string) {
    return this.pendingDeletion.delete(jobId);
  }

  /** Resolves once every notification started so far has settled. */
  async flushNotifications() {
    await Promise.all([...this.notifications]);
  }

  private async runLoop(workerNo: number) {
    while (this.running) {
      const jobId = await this.queue.take();
      if (jobId === null) break;

      this.claimed.add(jobId);
      try {
        await this.processJob(jobId);
      } catch (err: unknown) {
        // Reached only when even recording the failure did not work.
        this.logger.error(
          `Worker ${workerNo} could not finish job ${jobId}: ${errorMessage(err)}`,
        );
      } finally {
        this.claimed.delete(jobId);
      }
    }
  }

  private async processJob(jobId: string) {
    const job = await this.store.get(jobId);
    if (!job) {
      this.logger.debug(`Job ${jobId} was deleted before processing; skipping`);
      return;
    }

    if (this.takeDeferredDeletion(jobId)) {
      this.logger.log(`Job ${jobId} deleted before it started`);
      await this.purger.purge(job);
      return;
    }

    if (job.status !== 'queued') {
      this.logger.warn(`Job ${jobId} dequeued in state ${job.status}; skipping`);
      return;
    }

    let finished: RenderJob;
    let published: PublishedOutputs | null = null;
    try {
      await this.store.updateStatus(jobId, 'processing', { message: PROCESSING_MESSAGE });
      published = await this.render(job);
      finished = await this.store.updateStatus(jobId, 'completed', {
        message: COMPLETED_MESSAGE,
        outputPath: published.videoPath,
      });
    } catch (err: unknown) {
      published = null;
      finished = await this.store.updateStatus(jobId, 'failed', {
        message: errorMessage(err),
      });
      this.logger.warn(`Job ${jobId} failed: ${finished.message}`);
    }

    if (this.takeDeferredDeletion(jobId)) {
      this.logger.log(`Job ${jobId} finished with a deletion pending; purging`);
      await this.purger.purge(finished);
      return;
    }

    const webhookUrl = finished.config.discord_webhook_url;
    if (finished.status === 'completed' && published && webhookUrl) {
      this.startNotification(webhookUrl, finished, published);
    }
  }

  private async render(job: RenderJob): Promise<PublishedOutputs> {
    const controller = new AbortController();
    this.inflight.set(job.id, controller);
    try {
      const result = await this.renderer.render({
        jobId: job.id,
        inputPath: this.artifacts.locateInput(job.id, job.originalFilename),
        config: job.config,
        signal: controller.signal,
      });
      if (!result.ok) throw result.error;
      return await this.artifacts.publishOutputs(job.id, result.outputs);
    } finally {
      this.inflight.delete(job.id);
    }
  }

  private startNotification(webhookUrl: string, job: RenderJob, outputs: PublishedOutputs) {
    const pending = this.notifier.notify(webhookUrl, job, outputs);
    this.notifications.add(pending);
    void pending.finally(() => this.notifications.delete(pending));
  }

  private async recoverInterruptedJobs() {
    const interrupted = await this.store.listByStatus('processing');
    for (const job of interrupted) {
      await this.store.updateStatus(job.id, 'failed', { message: INTERRUPTED_MESSAGE });
    }

    const queued = await this.store.listByStatus('queued');
    for (const job of queued) this.queue.push(job.id);

    if (interrupted.length || queued.length) {
      this.logger.log(
        `Recovered ${queued.length} queued job(s); ${interrupted.length} interrupted job(s) marked failed`,
      );
    }
  }
}
