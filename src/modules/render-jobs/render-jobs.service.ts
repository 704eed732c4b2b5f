import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import JSZip from 'jszip';
import { parse } from 'path';
import {
  AccessDeniedError,
  ArtifactMissingError,
  JobNotReadyError,
  MetadataNotFoundError,
  NoCompletedJobsError,
  errorMessage,
} from '../../common/errors/render-job.errors';
import { pathExists } from '../../common/utils/fs.utils';
import { ArtifactsService, safeFileName } from './artifacts.service';
import type { RenderJob } from './entities/render-job.entity';
import { JobPurgerService } from './job-purger.service';
import { JobStoreService } from './job-store.service';
import { RetentionSweeperService } from './retention-sweeper.service';
import { WorkerPoolService } from './worker-pool.service';
import { RENDER_CLOCK } from './render-jobs.constants';
import {
  isTerminalStatus,
  type Clock,
  type Participant,
  type RenderConfig,
  type Requester,
  type UploadedAsset,
} from './render-jobs.types';

export type DeleteOutcome = { id: string; deferred: boolean };

export type BulkDeleteOutcome = { deleted: string[]; deferred: string[] };

export type OutputArchive = { archive: Buffer; filename: string; entries: string[] };

const videoName = (job: RenderJob) => `${parse(job.originalFilename).name}.mp4`;

// `match.mp4`, `match (2).mp4`, ...
const uniqueEntryName = (name: string, taken: Set<string>) => {
  const { name: stem, ext } = parse(name);
  let candidate = name;
  for (let n = 2; taken.has(candidate); n++) candidate = `${stem} (${n})${ext}`;
  taken.add(candidate);
  return candidate;
};

const archiveStamp = (at: Date) =>
  at.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');

/** Entry point for everything outside the core: submission, reads, deletion. */
@Injectable()
export class RenderJobsService {
  private readonly logger = new Logger(RenderJobsService.name);

  constructor(
    private readonly store: JobStoreService,
    private readonly artifacts: ArtifactsService,
    private readonly purger: JobPurgerService,
    private readonly pool: WorkerPoolService,
    private readonly sweeper: RetentionSweeperService,
    @Inject(RENDER_CLOCK)
    private readonly now: Clock,
  ) {}

  async submit(params: {
    file: UploadedAsset;
    ownerToken: string;
    config: RenderConfig;
  }): Promise<RenderJob> {
    const id = randomUUID();
    const filename = safeFileName(params.file.originalName);

    await this.artifacts.storeInput(id, filename, params.file.buffer);

    let job: RenderJob;
    try {
      job = await this.store.create({
        id,
        originalFilename: filename,
        ownerToken: params.ownerToken,
        config: params.config,
      });
    } catch (err: unknown) {
      await this.artifacts.deleteAll(id, filename);
      throw err;
    }

    this.pool.enqueue(id);
    this.logger.log(`Queued job ${id} (${filename})`);
    return job;
  }

  getStatus(id: string, requester: Requester) {
    return this.getAuthorized(id, requester);
  }

  listForOwner(ownerToken: string) {
    return this.store.listByOwner(ownerToken);
  }

  listAll() {
    return this.store.listAll();
  }

  async fetchOutput(id: string, requester: Requester) {
    const job = await this.getAuthorized(id, requester);
    if (job.status !== 'completed' || !job.outputPath) {
      throw new JobNotReadyError(id, job.status);
    }
    if (!(await pathExists(job.outputPath))) {
      throw new ArtifactMissingError(id, job.outputPath);
    }
    return {
      path: job.outputPath,
      downloadName: videoName(job),
    };
  }

  /** Zips every completed video the owner still has on disk, named after its upload. */
  async downloadAllForOwner(ownerToken: string): Promise<OutputArchive> {
    const jobs = await this.store.listByOwner(ownerToken);
    const zip = new JSZip();
    const entries: string[] = [];
    const taken = new Set<string>();

    for (const job of jobs) {
      if (job.status !== 'completed' || !job.outputPath) continue;
      if (!(await pathExists(job.outputPath))) {
        this.logger.warn(`Video for job ${job.id} is missing; leaving it out of the archive`);
        continue;
      }
      const entry = uniqueEntryName(videoName(job), taken);
      zip.file(entry, await fs.promises.readFile(job.outputPath));
      entries.push(entry);
    }

    if (!entries.length) throw new NoCompletedJobsError();

    const archive = await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
    return { archive, filename: `renders_${archiveStamp(this.now())}.zip`, entries };
  }

  async fetchMetadata(id: string, requester: Requester): Promise<Participant[]> {
    await this.getAuthorized(id, requester);
    const participants = await this.artifacts.readMetadata(id);
    if (!participants) throw new MetadataNotFoundError(id);
    return participants;
  }

  async deleteJob(id: string, requester: Requester): Promise<DeleteOutcome> {
    const job = await this.getAuthorized(id, requester);
    return this.remove(job);
  }

  async deleteAllForOwner(ownerToken: string) {
    return this.removeMany(await this.store.listByOwner(ownerToken));
  }

  async deleteAll() {
    return this.removeMany(await this.store.listAll());
  }

  getRetentionPolicy() {
    return this.sweeper.getPolicy();
  }

  sweepNow() {
    return this.sweeper.sweepOnce();
  }

  private async getAuthorized(id: string, requester: Requester) {
    const job = await this.store.getOrThrow(id);
    if (requester.kind === 'owner' && job.ownerToken !== requester.ownerToken) {
      throw new AccessDeniedError(id);
    }
    return job;
  }

  private async remove(job: RenderJob): Promise<DeleteOutcome> {
    let target = job;
    if (!isTerminalStatus(job.status)) {
      // Only the owning worker may touch a job that is still running.
      this.pool.deferDeletion(job.id);

      // The worker may have finished between our read and the hand-off.
      const latest = await this.store.get(job.id);
      if (!latest) {
        this.pool.takeDeferredDeletion(job.id);
        return { id: job.id, deferred: false };
      }
      if (!isTerminalStatus(latest.status) || !this.pool.takeDeferredDeletion(job.id)) {
        this.logger.log(`Deletion of job ${job.id} deferred until it finishes`);
        return { id: job.id, deferred: true };
      }
      target = latest;
    }

    await this.purger.purge(target);
    this.logger.log(`Deleted job ${job.id}`);
    return { id: job.id, deferred: false };
  }

  private async removeMany(jobs: RenderJob[]): Promise<BulkDeleteOutcome> {
    const outcome: BulkDeleteOutcome = { deleted: [], deferred: [] };
    for (const job of jobs) {
      try {
        const result = await this.remove(job);
        (result.deferred ? outcome.deferred : outcome.deleted).push(job.id);
      } catch (err: unknown) {
        this.logger.error(`Failed to delete job ${job.id}: ${errorMessage(err)}`);
      }
    }
    return outcome;
  }
}
