import type { RenderJobStatus } from '../../modules/render-jobs/render-jobs.types';

export type RenderJobErrorCode =
  | 'NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'ARTIFACT_MISSING'
  | 'ENGINE_FAILURE'
  | 'ENGINE_TIMEOUT'
  | 'NOTIFICATION_FAILURE'
  | 'STORE_ERROR'
  | 'INVALID_TRANSITION'
  | 'JOB_NOT_READY';

/**
 * Base class for every failure the job orchestration layer reports.
 * The `code` is stable and is what API clients should branch on.
 */
export class RenderJobError extends Error {
  constructor(
    readonly code: RenderJobErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class JobNotFoundError extends RenderJobError {
  constructor(readonly jobId: string) {
    super('NOT_FOUND', `Render job ${jobId} not found`);
  }
}

export class MetadataNotFoundError extends RenderJobError {
  constructor(readonly jobId: string) {
    super('NOT_FOUND', 'Player info not found');
  }
}

export class NoCompletedJobsError extends RenderJobError {
  constructor() {
    super('NOT_FOUND', 'No completed jobs found');
  }
}

export class AccessDeniedError extends RenderJobError {
  constructor(readonly jobId: string) {
    super('ACCESS_DENIED', 'Access denied');
  }
}

export class ArtifactMissingError extends RenderJobError {
  constructor(
    readonly jobId: string,
    readonly expectedPath: string,
  ) {
    super('ARTIFACT_MISSING', 'Output file not found after rendering.');
  }
}

const withDiagnostics = (head: string, diagnostics: string) =>
  diagnostics ? `${head}: ${diagnostics}` : head;

export class EngineFailureError extends RenderJobError {
  constructor(
    readonly exitCode: number | null,
    readonly signal: string | null,
    readonly diagnostics: string,
  ) {
    const indicator =
      exitCode !== null
        ? `code ${exitCode}`
        : signal
          ? `signal ${signal}`
          : 'an internal error';
    super(
      'ENGINE_FAILURE',
      withDiagnostics(`Renderer failed with ${indicator}`, diagnostics),
    );
  }
}

export class EngineTimeoutError extends RenderJobError {
  constructor(
    readonly timeoutMs: number,
    readonly diagnostics: string,
  ) {
    super(
      'ENGINE_TIMEOUT',
      withDiagnostics(
        `Renderer timed out after ${Math.round(timeoutMs / 1000)}s`,
        diagnostics,
      ),
    );
  }
}

export class NotificationFailureError extends RenderJobError {
  constructor(
    readonly jobId: string,
    detail: string,
  ) {
    super('NOTIFICATION_FAILURE', `Webhook notification for job ${jobId} failed: ${detail}`);
  }
}

export class StoreError extends RenderJobError {
  constructor(
    readonly operation: string,
    readonly reason: unknown,
  ) {
    super('STORE_ERROR', `Job store ${operation} failed: ${errorMessage(reason)}`);
  }
}

export class InvalidTransitionError extends RenderJobError {
  constructor(
    readonly jobId: string,
    readonly from: RenderJobStatus,
    readonly to: RenderJobStatus,
    reason?: string,
  ) {
    super(
      'INVALID_TRANSITION',
      `Render job ${jobId} cannot move from ${from} to ${to}${reason ? ` (${reason})` : ''}`,
    );
  }
}

export class JobNotReadyError extends RenderJobError {
  constructor(
    readonly jobId: string,
    readonly status: RenderJobStatus,
  ) {
    super('JOB_NOT_READY', 'Job not completed');
  }
}

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  return String(err);
};
