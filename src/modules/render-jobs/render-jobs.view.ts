import contentDisposition from 'content-disposition';
import type { RenderJob } from './entities/render-job.entity';
import type { RenderConfig, RenderJobStatus } from './render-jobs.types';

export type RenderJobView = {
  id: string;
  filename: string;
  status: RenderJobStatus;
  message: string;
  config: Omit<RenderConfig, 'discord_webhook_url'> & { notify: boolean };
  createdAt: string;
  completedAt: string | null;
};

// Owner tokens, file paths and webhook urls stay server-side.
export const toJobView = (job: RenderJob): RenderJobView => {
  const { discord_webhook_url, ...options } = job.config;
  return {
    id: job.id,
    filename: job.originalFilename,
    status: job.status,
    message: job.message,
    config: { ...options, notify: !!discord_webhook_url },
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
  };
};

/** Quoted `filename` for latin1 names, plus an RFC 5987 `filename*` for anything else. */
export const dispositionHeader = (
  filename: string,
  type: 'inline' | 'attachment' = 'attachment',
) => contentDisposition(filename, { type });
