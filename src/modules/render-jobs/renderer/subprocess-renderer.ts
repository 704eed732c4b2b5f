import { Inject, Injectable, Logger } from '@nestjs/common';
import { spawn } from 'child_process';
import { resolve } from 'path';
import {
  EngineFailureError,
  EngineTimeoutError,
  errorMessage,
} from '../../../common/errors/render-job.errors';
import { TailBuffer } from '../../../common/utils/tail-buffer';
import {
  renderJobsConfig,
  type RenderJobsConfigType,
} from '../../../config/render-jobs.config';
import { DEFAULT_FPS, DEFAULT_QUALITY } from '../render-jobs.constants';
import type { RenderConfig } from '../render-jobs.types';
import {
  engineOutputCandidates,
  type RenderRequest,
  type RenderResult,
  type Renderer,
} from './renderer.interface';

export const buildRendererArgs = (inputPath: string, config: RenderConfig) => {
  const args = ['--replay', resolve(inputPath)];

  if (config.anon) args.push('--anon');
  if (config.no_chat) args.push('--no-chat');
  if (config.no_logs) args.push('--no-logs');
  if (config.team_tracers) args.push('--team-tracers');

  args.push('--fps', String(config.fps ?? DEFAULT_FPS));
  args.push('--quality', String(config.quality ?? DEFAULT_QUALITY));
  return args;
};

type ExitOutcome = {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
};

/** Runs the replay renderer as a child process, one process per job. */
@Injectable()
export class SubprocessRenderer implements Renderer {
  private readonly logger = new Logger(SubprocessRenderer.name);

  constructor(
    @Inject(renderJobsConfig.KEY)
    private readonly config: RenderJobsConfigType,
  ) {}

  async render(request: RenderRequest): Promise<RenderResult> {
    const { command, cwd, timeoutMs, outputLimitBytes } = this.config.renderer;
    const args = [
      ...this.config.renderer.args,
      ...buildRendererArgs(request.inputPath, request.config),
    ];
    const diagnostics = new TailBuffer(outputLimitBytes);

    this.logger.log(`Starting job ${request.jobId}: ${command} ${args.join(' ')}`);

    let outcome: ExitOutcome;
    try {
      outcome = await this.run(command, args, cwd, timeoutMs, diagnostics, request.signal);
    } catch (err: unknown) {
      // spawn() itself failed, e.g. the command does not exist.
      return {
        ok: false,
        error: new EngineFailureError(null, null, errorMessage(err)),
      };
    }

    if (outcome.timedOut) {
      this.logger.warn(`Renderer timed out for job ${request.jobId}`);
      return {
        ok: false,
        error: new EngineTimeoutError(timeoutMs, diagnostics.toString()),
      };
    }

    if (outcome.aborted) {
      return {
        ok: false,
        error: new EngineFailureError(null, outcome.signal, 'Render aborted during shutdown'),
      };
    }

    if (outcome.code !== 0) {
      this.logger.warn(
        `Renderer failed for job ${request.jobId} (exit ${outcome.code ?? outcome.signal})`,
      );
      return {
        ok: false,
        error: new EngineFailureError(outcome.code, outcome.signal, diagnostics.toString()),
      };
    }

    return {
      ok: true,
      outputs: engineOutputCandidates(request.inputPath),
      diagnostics: diagnostics.toString(),
    };
  }

  private run(
    command: string,
    args: string[],
    cwd: string,
    timeoutMs: number,
    diagnostics: TailBuffer,
    signal?: AbortSignal,
  ) {
    return new Promise<ExitOutcome>((resolvePromise, reject) => {
      let timedOut = false;
      let aborted = false;

      const child = spawn(command, args, {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs);

      const onAbort = () => {
        aborted = true;
        child.kill('SIGKILL');
      };
      if (signal?.aborted) onAbort();
      else signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      child.stdout.on('data', (d: Buffer) => diagnostics.push(d));
      child.stderr.on('data', (d: Buffer) => diagnostics.push(d));
      child.on('error', (err) => {
        cleanup();
        reject(err);
      });
      child.on('close', (code, exitSignal) => {
        cleanup();
        resolvePromise({ code, signal: exitSignal, timedOut, aborted });
      });
    });
  }
}
