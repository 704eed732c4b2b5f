import { join, parse } from 'path';
import type {
  EngineFailureError,
  EngineTimeoutError,
} from '../../../common/errors/render-job.errors';
import type { RenderCandidates, RenderConfig } from '../render-jobs.types';

export type RenderRequest = {
  jobId: string;
  inputPath: string;
  config: RenderConfig;
  signal?: AbortSignal;
};

export type RenderResult =
  | { ok: true; outputs: RenderCandidates; diagnostics: string }
  | { ok: false; error: EngineFailureError | EngineTimeoutError };

/** The rendering engine, seen from the worker pool. */
export interface Renderer {
  render(request: RenderRequest): Promise<RenderResult>;
}

// The engine writes `<stem>.mp4` and `<stem>-builds.json` beside the replay.
export const engineOutputCandidates = (inputPath: string): RenderCandidates => {
  const { dir, name } = parse(inputPath);
  return {
    videoPath: join(dir, `${name}.mp4`),
    metadataPath: join(dir, `${name}-builds.json`),
  };
};
