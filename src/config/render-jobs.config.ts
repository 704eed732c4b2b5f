import { ConfigType, registerAs } from '@nestjs/config';
import { resolve } from 'path';

const getPositiveIntOrNull = (value: unknown) => {
  const num = typeof value === 'string' ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isFinite(num) || num <= 0) return null;
  return Math.floor(num);
};

const splitArgs = (raw: string | undefined, fallback: string[]) => {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return fallback;
  return trimmed.split(/\s+/);
};

const parseRelations = (raw: string | undefined, fallback: number[]) => {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return fallback;
  const parsed = trimmed
    .split(',')
    .map((part) => Number.parseInt(part.trim(), 10))
    .filter((n) => Number.isInteger(n));
  return parsed.length ? parsed : fallback;
};

export type RenderJobsConfig = {
  uploadDir: string;
  outputDir: string;
  workerConcurrency: number;
  renderer: {
    command: string;
    args: string[];
    cwd: string;
    timeoutMs: number;
    outputLimitBytes: number;
  };
  retention: {
    ageHours: number;
    intervalMs: number;
  };
  notify: {
    // Relations that are NOT the player the replay was recorded by (0 = ally, 1 = enemy).
    nonSubjectRelations: number[];
    maxFileBytes: number;
    timeoutMs: number;
  };
  adminToken: string | null;
};

export const buildRenderJobsConfig = (env: NodeJS.ProcessEnv): RenderJobsConfig => ({
  uploadDir: resolve(env.UPLOAD_DIR ?? 'uploads'),
  outputDir: resolve(env.OUTPUT_DIR ?? 'outputs'),
  workerConcurrency: getPositiveIntOrNull(env.WORKER_CONCURRENCY) ?? 1,
  renderer: {
    command: (env.RENDERER_COMMAND ?? '').trim() || 'replay-renderer',
    args: splitArgs(env.RENDERER_ARGS, []),
    cwd: resolve(env.RENDERER_CWD ?? '.'),
    timeoutMs: getPositiveIntOrNull(env.RENDERER_TIMEOUT_MS) ?? 2 * 60 * 60_000,
    outputLimitBytes: getPositiveIntOrNull(env.RENDERER_OUTPUT_LIMIT) ?? 4096,
  },
  retention: {
    ageHours: getPositiveIntOrNull(env.CLEANUP_HOURS) ?? 24,
    intervalMs: getPositiveIntOrNull(env.CLEANUP_INTERVAL_MS) ?? 60 * 60_000,
  },
  notify: {
    nonSubjectRelations: parseRelations(env.NOTIFY_NON_SUBJECT_RELATIONS, [0, 1]),
    maxFileBytes: getPositiveIntOrNull(env.NOTIFY_MAX_FILE_BYTES) ?? 25 * 1024 * 1024,
    timeoutMs: getPositiveIntOrNull(env.NOTIFY_TIMEOUT_MS) ?? 30_000,
  },
  adminToken: (env.ADMIN_TOKEN ?? '').trim() || null,
});

export const renderJobsConfig = registerAs('renderJobs', () =>
  buildRenderJobsConfig(process.env),
);

export type RenderJobsConfigType = ConfigType<typeof renderJobsConfig>;
