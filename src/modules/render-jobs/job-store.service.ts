import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, LessThan, Repository } from 'typeorm';
import {
  InvalidTransitionError,
  JobNotFoundError,
  RenderJobError,
  StoreError,
} from '../../common/errors/render-job.errors';
import { KeyedMutex } from '../../common/utils/keyed-mutex';
import { RenderJob } from './entities/render-job.entity';
import { RENDER_CLOCK } from './render-jobs.constants';
import {
  TERMINAL_STATUSES,
  isTerminalStatus,
  type Clock,
  type RenderConfig,
  type RenderJobStatus,
} from './render-jobs.types';

const ALLOWED_TRANSITIONS: Record<RenderJobStatus, readonly RenderJobStatus[]> = {
  queued: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * Durable job records. Writes to one job id are serialized in-process; writes
 * to different ids never wait on each other.
 */
@Injectable()
export class JobStoreService {
  private readonly logger = new Logger(JobStoreService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    @InjectRepository(RenderJob)
    private readonly jobsRepo: Repository<RenderJob>,
    @Inject(RENDER_CLOCK)
    private readonly now: Clock,
  ) {}

  async create(params: {
    id: string;
    originalFilename: string;
    ownerToken: string;
    config: RenderConfig;
  }): Promise<RenderJob> {
    const job = this.jobsRepo.create({
      id: params.id,
      originalFilename: params.originalFilename,
      ownerToken: params.ownerToken,
      status: 'queued',
      message: '',
      config: { ...params.config },
      createdAt: this.now(),
      completedAt: null,
      outputPath: null,
    });

    await this.guard('create', () => this.jobsRepo.insert(job));
    return job;
  }

  get(id: string): Promise<RenderJob | null> {
    return this.guard('get', () => this.jobsRepo.findOne({ where: { id } }));
  }

  async getOrThrow(id: string): Promise<RenderJob> {
    const job = await this.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  listByOwner(ownerToken: string): Promise<RenderJob[]> {
    return this.guard('listByOwner', () =>
      this.jobsRepo.find({
        where: { ownerToken },
        order: { createdAt: 'DESC' },
      }),
    );
  }

  listAll(): Promise<RenderJob[]> {
    return this.guard('listAll', () =>
      this.jobsRepo.find({ order: { createdAt: 'DESC' } }),
    );
  }

  listByStatus(status: RenderJobStatus): Promise<RenderJob[]> {
    return this.guard('listByStatus', () =>
      this.jobsRepo.find({
        where: { status },
        order: { createdAt: 'ASC' },
      }),
    );
  }

  listTerminalOlderThan(cutoff: Date): Promise<RenderJob[]> {
    return this.guard('listTerminalOlderThan', () =>
      this.jobsRepo.find({
        where: {
          status: In([...TERMINAL_STATUSES]),
          completedAt: LessThan(cutoff),
        },
        order: { completedAt: 'ASC' },
      }),
    );
  }

  /**
   * Moves a job along its state machine. `completedAt` is stamped here, once,
   * on entering a terminal state; `outputPath` is only accepted for `completed`.
   */
  updateStatus(
    id: string,
    status: RenderJobStatus,
    opts: { message?: string; outputPath?: string } = {},
  ): Promise<RenderJob> {
    return this.locks.runExclusive(id, async () => {
      const job = await this.getOrThrow(id);

      if (!ALLOWED_TRANSITIONS[job.status].includes(status)) {
        throw new InvalidTransitionError(id, job.status, status);
      }
      if (status === 'completed' && !opts.outputPath) {
        throw new InvalidTransitionError(id, job.status, status, 'missing output path');
      }
      if (status !== 'completed' && opts.outputPath) {
        throw new InvalidTransitionError(id, job.status, status, 'output path is only set on completion');
      }

      const patch: Partial<RenderJob> = {
        status,
        message: opts.message ?? job.message,
      };
      if (isTerminalStatus(status)) patch.completedAt = this.now();
      if (status === 'completed') patch.outputPath = opts.outputPath ?? null;

      await this.guard('updateStatus', () => this.jobsRepo.update({ id }, patch));
      this.logger.log(`Job ${id}: ${job.status} -> ${status}`);
      return Object.assign(job, patch);
    });
  }

  delete(id: string): Promise<void> {
    return this.locks.runExclusive(id, async () => {
      await this.guard('delete', () => this.jobsRepo.delete({ id }));
    });
  }

  private async guard<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (err: unknown) {
      if (err instanceof RenderJobError) throw err;
      throw new StoreError(operation, err);
    }
  }
}
