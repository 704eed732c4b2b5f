export type RenderJobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export type TerminalStatus = Extract<RenderJobStatus, 'completed' | 'failed'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['completed', 'failed'];

export const isTerminalStatus = (status: RenderJobStatus): status is TerminalStatus =>
  status === 'completed' || status === 'failed';

// Options captured at submission; snake_case matches the engine flags and the upload form.
export type RenderConfig = {
  anon: boolean;
  no_chat: boolean;
  no_logs: boolean;
  team_tracers: boolean;
  fps: number;
  quality: number;
  discord_webhook_url?: string | null;
};

// One row of the engine's `-builds.json` metadata artifact.
export type Participant = {
  name: string;
  clan?: string | null;
  ship: string;
  relation: number;
  build_url?: string | null;
};

export type UploadedAsset = {
  buffer: Buffer;
  originalName: string;
};

// Files the engine leaves next to the input when it succeeds.
export type RenderCandidates = {
  videoPath: string;
  metadataPath: string;
};

export type PublishedOutputs = {
  videoPath: string;
  metadataPath: string | null;
};

export type Requester =
  | { kind: 'owner'; ownerToken: string }
  | { kind: 'admin' };

export type Clock = () => Date;
