export const RENDER_JOB_QUEUE = Symbol('RENDER_JOB_QUEUE');
export const RENDERER = Symbol('RENDERER');
export const RENDER_CLOCK = Symbol('RENDER_CLOCK');

export const DEFAULT_FPS = 20;
export const DEFAULT_QUALITY = 7;
export const MIN_FPS = 1;
export const MAX_FPS = 60;
export const MIN_QUALITY = 0;
export const MAX_QUALITY = 10;

export const MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

export const OWNER_TOKEN_HEADER = 'x-session-id';
export const OWNER_TOKEN_MAX_LENGTH = 64;
export const ADMIN_TOKEN_HEADER = 'x-admin-token';

export const PROCESSING_MESSAGE = 'Rendering';
export const COMPLETED_MESSAGE = 'Render complete';
export const INTERRUPTED_MESSAGE = 'Interrupted by server restart';
