import * as fs from 'fs';
import {
  FakeRenderer,
  createCore,
  defaultRenderConfig,
  submitReplay,
  waitFor,
  waitForTerminal,
  type Core,
} from './testing/render-jobs.testing';

const HOUR_MS = 60 * 60_000;

describe('RetentionSweeperService', () => {
  let core: Core;

  const finish = async (filename: string, owner = 'owner-a') => {
    const { id } = await submitReplay(core, filename, owner);
    await waitForTerminal(core, id);
    return id;
  };

  beforeEach(async () => {
    core = await createCore({
      renderer: new FakeRenderer(),
      config: { retention: { ageHours: 24, intervalMs: HOUR_MS } },
    });
    core.pool.start();
  });

  afterEach(async () => {
    await core.close();
  });

  it('exposes the configured policy', () => {
    expect(core.sweeper.getPolicy()).toEqual({ ageHours: 24, intervalMs: HOUR_MS });
  });

  it('removes terminal jobs older than the retention age', async () => {
    const done = await finish('old.wowsreplay');
    const failed = await finish('engine-fail.wowsreplay');
    core.clock.advance(25 * HOUR_MS);
    const fresh = await finish('fresh.wowsreplay');

    const removed = await core.sweeper.sweepOnce();

    expect([...removed].sort()).toEqual([done, failed].sort());
    await expect(core.store.get(done)).resolves.toBeNull();
    await expect(core.store.get(failed)).resolves.toBeNull();
    expect(fs.existsSync(core.artifacts.videoPath(done))).toBe(false);
    expect((await core.store.getOrThrow(fresh)).status).toBe('completed');
    expect(fs.existsSync(core.artifacts.videoPath(fresh))).toBe(true);
  });

  it('keeps jobs completed exactly at the age limit', async () => {
    const id = await finish('edge.wowsreplay');
    core.clock.advance(24 * HOUR_MS);

    await expect(core.sweeper.sweepOnce()).resolves.toEqual([]);
    await expect(core.store.get(id)).resolves.not.toBeNull();
  });

  it('never removes jobs that are not terminal', async () => {
    await core.store.create({
      id: 'stale-queued',
      originalFilename: 'stale.wowsreplay',
      ownerToken: 'owner-a',
      config: defaultRenderConfig(),
    });
    core.clock.advance(48 * HOUR_MS);

    await expect(core.sweeper.sweepOnce()).resolves.toEqual([]);
    expect((await core.store.getOrThrow('stale-queued')).status).toBe('queued');
  });

  it('continues past a job that cannot be removed', async () => {
    const first = await finish('first.wowsreplay');
    const second = await finish('second.wowsreplay');
    core.clock.advance(25 * HOUR_MS);
    jest.spyOn(core.purger, 'purge').mockRejectedValueOnce(new Error('disk busy'));

    const removed = await core.sweeper.sweepOnce();

    expect(removed).toHaveLength(1);
    const survivors = [first, second].filter((id) => !removed.includes(id));
    expect(survivors).toHaveLength(1);
    await expect(core.store.get(survivors[0])).resolves.not.toBeNull();
  });

  it('joins a cycle that is already running', async () => {
    const a = core.sweeper.sweepOnce();
    const b = core.sweeper.sweepOnce();

    expect(b).toBe(a);
    await a;
  });

  it('sweeps immediately on start and then on every interval', async () => {
    await core.close();
    core = await createCore({
      renderer: new FakeRenderer(),
      config: { retention: { ageHours: 24, intervalMs: 10 } },
    });
    const sweep = jest.spyOn(core.sweeper, 'sweepOnce').mockResolvedValue([]);

    core.sweeper.start();
    expect(sweep).toHaveBeenCalledTimes(1);

    await waitFor(() => sweep.mock.calls.length >= 3);
    core.sweeper.stop();
    const calls = sweep.mock.calls.length;
    await new Promise((r) => setTimeout(r, 50));
    expect(sweep.mock.calls.length).toBe(calls);
  });
});
