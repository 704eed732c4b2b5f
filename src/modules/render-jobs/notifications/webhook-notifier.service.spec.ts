import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import { ArtifactsService } from '../artifacts.service';
import { RenderJob } from '../entities/render-job.entity';
import {
  SAMPLE_PARTICIPANTS,
  buildTestConfig,
  defaultRenderConfig,
  makeTempDir,
} from '../testing/render-jobs.testing';
import { buildRenderSummary } from './render-summary';
import { WebhookNotifierService } from './webhook-notifier.service';

const WEBHOOK_URL = 'https://discord.test/api/webhooks/1/test-token';

describe('WebhookNotifierService', () => {
  let root: string;
  let artifacts: ArtifactsService;
  let fetchMock: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  const makeJob = () =>
    Object.assign(new RenderJob(), {
      id: 'job-1',
      originalFilename: 'match.wowsreplay',
      ownerToken: 'owner-a',
      status: 'completed',
      message: 'Render complete',
      config: defaultRenderConfig({ discord_webhook_url: WEBHOOK_URL }),
      createdAt: new Date('2026-01-01T00:00:00.000Z'),
      completedAt: new Date('2026-01-01T00:01:00.000Z'),
      outputPath: null,
    });

  const makeNotifier = (maxFileBytes = 1024) => {
    const config = buildTestConfig(root);
    return new WebhookNotifierService(artifacts, {
      ...config,
      notify: { ...config.notify, maxFileBytes },
    });
  };

  const writeOutputs = (withMetadata = true) => {
    fs.writeFileSync(artifacts.videoPath('job-1'), 'video-bytes');
    if (withMetadata) {
      fs.writeFileSync(artifacts.metadataPath('job-1'), JSON.stringify(SAMPLE_PARTICIPANTS));
    }
    return {
      videoPath: artifacts.videoPath('job-1'),
      metadataPath: withMetadata ? artifacts.metadataPath('job-1') : null,
    };
  };

  const sentForm = () => {
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(WEBHOOK_URL);
    expect(init?.method).toBe('POST');
    const body = init?.body;
    if (!(body instanceof FormData)) throw new Error('expected a multipart body');
    return body;
  };

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    root = makeTempDir();
    artifacts = new ArtifactsService(buildTestConfig(root));
    artifacts.onModuleInit();
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('posts the summary with the video attached', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const outputs = writeOutputs();

    await expect(makeNotifier().notify(WEBHOOK_URL, makeJob(), outputs)).resolves.toBe(true);

    const form = sentForm();
    expect(JSON.parse(String(form.get('payload_json')))).toEqual(
      buildRenderSummary(SAMPLE_PARTICIPANTS, { nonSubjectRelations: [0, 1] }),
    );
    const file = form.get('file');
    if (!(file instanceof Blob)) throw new Error('expected an attachment');
    expect(file.type).toBe('video/mp4');
    expect('name' in file ? file.name : null).toBe('match.mp4');
    await expect(file.text()).resolves.toBe('video-bytes');
  });

  it('sends plain content when there is no metadata', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 200 }));
    const outputs = writeOutputs(false);

    await expect(makeNotifier().notify(WEBHOOK_URL, makeJob(), outputs)).resolves.toBe(true);

    expect(JSON.parse(String(sentForm().get('payload_json')))).toEqual({
      content: 'No player info available.',
    });
  });

  it('leaves out videos above the attachment limit', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const outputs = writeOutputs();

    await expect(makeNotifier(4).notify(WEBHOOK_URL, makeJob(), outputs)).resolves.toBe(true);

    const form = sentForm();
    expect(form.get('file')).toBeNull();
    expect(form.get('payload_json')).not.toBeNull();
  });

  it('reports rejected deliveries without throwing', async () => {
    fetchMock.mockResolvedValue(new Response('rate limited', { status: 429 }));

    await expect(
      makeNotifier().notify(WEBHOOK_URL, makeJob(), writeOutputs()),
    ).resolves.toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports network errors without throwing', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND discord.test'));

    await expect(
      makeNotifier().notify(WEBHOOK_URL, makeJob(), writeOutputs()),
    ).resolves.toBe(false);
  });

  it('reports a missing video without calling the webhook', async () => {
    await expect(
      makeNotifier().notify(WEBHOOK_URL, makeJob(), {
        videoPath: artifacts.videoPath('job-1'),
        metadataPath: null,
      }),
    ).resolves.toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
