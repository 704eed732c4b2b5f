import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import { parse } from 'path';
import {
  NotificationFailureError,
  errorMessage,
} from '../../../common/errors/render-job.errors';
import {
  renderJobsConfig,
  type RenderJobsConfigType,
} from '../../../config/render-jobs.config';
import { ArtifactsService } from '../artifacts.service';
import type { RenderJob } from '../entities/render-job.entity';
import type { PublishedOutputs } from '../render-jobs.types';
import { buildRenderSummary } from './render-summary';

/**
 * Posts a finished render to a Discord-compatible webhook. At most one
 * attempt per job; failures are logged and reported as `false`.
 */
@Injectable()
export class WebhookNotifierService {
  private readonly logger = new Logger(WebhookNotifierService.name);

  constructor(
    private readonly artifacts: ArtifactsService,
    @Inject(renderJobsConfig.KEY)
    private readonly config: RenderJobsConfigType,
  ) {}

  async notify(
    webhookUrl: string,
    job: RenderJob,
    outputs: PublishedOutputs,
  ): Promise<boolean> {
    try {
      const body = await this.buildPayload(job, outputs);
      await this.post(webhookUrl, job.id, body);
      this.logger.log(`Webhook notification sent for job ${job.id}`);
      return true;
    } catch (err: unknown) {
      const failure =
        err instanceof NotificationFailureError
          ? err
          : new NotificationFailureError(job.id, errorMessage(err));
      this.logger.warn(failure.message);
      return false;
    }
  }

  private async buildPayload(job: RenderJob, outputs: PublishedOutputs) {
    const participants = outputs.metadataPath
      ? await this.artifacts.readMetadata(job.id)
      : null;
    const summary = buildRenderSummary(participants, {
      nonSubjectRelations: this.config.notify.nonSubjectRelations,
    });

    const form = new FormData();
    form.append('payload_json', JSON.stringify(summary));

    const { size } = await fs.promises.stat(outputs.videoPath);
    if (size <= this.config.notify.maxFileBytes) {
      const video = await fs.promises.readFile(outputs.videoPath);
      form.append(
        'file',
        new Blob([video], { type: 'video/mp4' }),
        `${parse(job.originalFilename).name}.mp4`,
      );
    } else {
      this.logger.warn(
        `Video for job ${job.id} is ${size} bytes; sending summary without attachment`,
      );
    }

    return form;
  }

  private async post(webhookUrl: string, jobId: string, body: FormData) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.notify.timeoutMs);
    try {
      let res: Response;
      try {
        res = await fetch(webhookUrl, {
          method: 'POST',
          body,
          signal: controller.signal,
        });
      } catch (err: unknown) {
        const reason =
          err instanceof Error && err.name === 'AbortError'
            ? 'Request timed out'
            : errorMessage(err);
        throw new NotificationFailureError(jobId, reason);
      }

      if (res.status !== 200 && res.status !== 204) {
        const text = await res.text().catch(() => '');
        throw new NotificationFailureError(
          jobId,
          `HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
