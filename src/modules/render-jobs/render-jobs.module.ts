import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RenderJobErrorFilter } from '../../common/errors/render-job-error.filter';
import { renderJobsConfig } from '../../config/render-jobs.config';
import { AdminRenderJobsController } from './admin-render-jobs.controller';
import { ArtifactsService } from './artifacts.service';
import { RenderJob } from './entities/render-job.entity';
import { AdminGuard } from './guards/admin.guard';
import { JobPurgerService } from './job-purger.service';
import { JobStoreService } from './job-store.service';
import { WebhookNotifierService } from './notifications/webhook-notifier.service';
import { WorkQueue } from './queue/work-queue';
import { SubprocessRenderer } from './renderer/subprocess-renderer';
import { RENDERER, RENDER_CLOCK, RENDER_JOB_QUEUE } from './render-jobs.constants';
import { RenderJobsController } from './render-jobs.controller';
import { RenderJobsService } from './render-jobs.service';
import { RetentionSweeperService } from './retention-sweeper.service';
import { WorkerPoolService } from './worker-pool.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([RenderJob]),
    ConfigModule.forFeature(renderJobsConfig),
  ],
  controllers: [RenderJobsController, AdminRenderJobsController],
  providers: [
    { provide: RENDER_JOB_QUEUE, useFactory: () => new WorkQueue<string>() },
    { provide: RENDER_CLOCK, useValue: () => new Date() },
    { provide: RENDERER, useClass: SubprocessRenderer },
    { provide: APP_FILTER, useClass: RenderJobErrorFilter },
    JobStoreService,
    ArtifactsService,
    JobPurgerService,
    WebhookNotifierService,
    WorkerPoolService,
    RetentionSweeperService,
    RenderJobsService,
    AdminGuard,
  ],
  exports: [RenderJobsService, JobStoreService, WorkerPoolService, RetentionSweeperService],
})
export class RenderJobsModule {}
