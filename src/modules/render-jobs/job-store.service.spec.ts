import 'reflect-metadata';
import { DataSource } from 'typeorm';
import {
  InvalidTransitionError,
  JobNotFoundError,
  StoreError,
} from '../../common/errors/render-job.errors';
import { RenderJob } from './entities/render-job.entity';
import { JobStoreService } from './job-store.service';
import { isTerminalStatus } from './render-jobs.types';
import {
  ManualClock,
  createTestDataSource,
  defaultRenderConfig,
} from './testing/render-jobs.testing';

describe('JobStoreService', () => {
  let dataSource: DataSource;
  let clock: ManualClock;
  let store: JobStoreService;

  const create = (id: string, ownerToken = 'owner-a') =>
    store.create({
      id,
      originalFilename: `${id}.wowsreplay`,
      ownerToken,
      config: defaultRenderConfig({ fps: 30 }),
    });

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    clock = new ManualClock();
    store = new JobStoreService(dataSource.getRepository(RenderJob), clock.now);
  });

  afterEach(async () => {
    if (dataSource.isInitialized) await dataSource.destroy();
  });

  it('creates queued jobs with an empty message and no completion data', async () => {
    await create('job-1');

    const job = await store.get('job-1');
    expect(job).not.toBeNull();
    expect(job?.status).toBe('queued');
    expect(job?.message).toBe('');
    expect(job?.completedAt).toBeNull();
    expect(job?.outputPath).toBeNull();
    expect(job?.config.fps).toBe(30);
    expect(job?.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });

  it('returns null for unknown ids and throws from getOrThrow', async () => {
    await expect(store.get('missing')).resolves.toBeNull();
    await expect(store.getOrThrow('missing')).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('lists jobs newest first, scoped by owner', async () => {
    await create('a1', 'owner-a');
    clock.advance(1000);
    await create('b1', 'owner-b');
    clock.advance(1000);
    await create('a2', 'owner-a');

    const mine = await store.listByOwner('owner-a');
    expect(mine.map((j) => j.id)).toEqual(['a2', 'a1']);

    const all = await store.listAll();
    expect(all.map((j) => j.id)).toEqual(['a2', 'b1', 'a1']);
  });

  it('stamps completedAt exactly when a job becomes terminal', async () => {
    await create('job-1');

    const processing = await store.updateStatus('job-1', 'processing', { message: 'Rendering' });
    expect(processing.completedAt).toBeNull();

    clock.advance(5000);
    const done = await store.updateStatus('job-1', 'completed', {
      message: 'Render complete',
      outputPath: '/out/job-1.mp4',
    });
    expect(done.completedAt?.toISOString()).toBe('2026-01-01T00:00:05.000Z');

    const stored = await store.getOrThrow('job-1');
    expect(stored.status).toBe('completed');
    expect(stored.outputPath).toBe('/out/job-1.mp4');
    expect(stored.completedAt?.toISOString()).toBe('2026-01-01T00:00:05.000Z');
  });

  it('keeps completedAt and outputPath consistent with the status', async () => {
    await create('ok');
    await create('bad');
    await store.updateStatus('ok', 'processing');
    await store.updateStatus('ok', 'completed', { outputPath: '/out/ok.mp4' });
    await store.updateStatus('bad', 'processing');
    await store.updateStatus('bad', 'failed', { message: 'Renderer failed with code 1' });

    for (const job of await store.listAll()) {
      expect(job.completedAt !== null).toBe(isTerminalStatus(job.status));
      if (job.outputPath !== null) expect(job.status).toBe('completed');
    }
  });

  it('refuses to leave a terminal state', async () => {
    await create('job-1');
    await store.updateStatus('job-1', 'processing');
    await store.updateStatus('job-1', 'failed', { message: 'boom' });

    await expect(store.updateStatus('job-1', 'processing')).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
    await expect(
      store.updateStatus('job-1', 'completed', { outputPath: '/out/x.mp4' }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);

    const job = await store.getOrThrow('job-1');
    expect(job.status).toBe('failed');
    expect(job.message).toBe('boom');
  });

  it('only accepts an output path on completion', async () => {
    await create('job-1');
    await store.updateStatus('job-1', 'processing');

    await expect(
      store.updateStatus('job-1', 'failed', { outputPath: '/out/job-1.mp4' }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(store.updateStatus('job-1', 'completed')).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
  });

  it('fails updates for unknown ids with NotFound', async () => {
    await expect(store.updateStatus('ghost', 'processing')).rejects.toBeInstanceOf(
      JobNotFoundError,
    );
  });

  it('serializes concurrent updates to the same job', async () => {
    await create('job-1');
    await store.updateStatus('job-1', 'processing');

    const results = await Promise.allSettled([
      store.updateStatus('job-1', 'completed', { outputPath: '/out/job-1.mp4' }),
      store.updateStatus('job-1', 'failed', { message: 'late' }),
    ]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    const job = await store.getOrThrow('job-1');
    expect(job.status).toBe('completed');
  });

  it('finds only terminal jobs completed before the cutoff', async () => {
    await create('old-done');
    await create('old-failed');
    await create('still-queued');
    await store.updateStatus('old-done', 'processing');
    await store.updateStatus('old-done', 'completed', { outputPath: '/out/a.mp4' });
    await store.updateStatus('old-failed', 'failed', { message: 'x' });

    clock.advance(60 * 60_000);
    await create('new-done');
    await store.updateStatus('new-done', 'processing');
    await store.updateStatus('new-done', 'completed', { outputPath: '/out/b.mp4' });

    const cutoff = new Date(clock.now().getTime() - 30 * 60_000);
    const expired = await store.listTerminalOlderThan(cutoff);
    expect(expired.map((j) => j.id).sort()).toEqual(['old-done', 'old-failed']);
  });

  it('deletes records and tolerates repeats', async () => {
    await create('job-1');
    await store.delete('job-1');
    await store.delete('job-1');
    await expect(store.get('job-1')).resolves.toBeNull();
  });

  it('wraps persistence failures in StoreError', async () => {
    await dataSource.destroy();
    await expect(store.listAll()).rejects.toBeInstanceOf(StoreError);
  });
});
