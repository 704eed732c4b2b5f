import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import {
  DEFAULT_FPS,
  DEFAULT_QUALITY,
  MAX_FPS,
  MAX_QUALITY,
  MIN_FPS,
  MIN_QUALITY,
} from '../render-jobs.constants';
import type { RenderConfig } from '../render-jobs.types';

// Multipart fields arrive as strings ("true", "on", "1").
const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'on', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'off', 'no', ''].includes(normalized)) return false;
  return value;
};

const emptyToUndefined = ({ value }: { value: unknown }) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export class CreateRenderJobDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  anon?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  no_chat?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  no_logs?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  team_tracers?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(MIN_FPS)
  @Max(MAX_FPS)
  fps?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(MIN_QUALITY)
  @Max(MAX_QUALITY)
  quality?: number;

  @IsOptional()
  @Transform(emptyToUndefined)
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  discord_webhook_url?: string;
}

export const toRenderConfig = (dto: CreateRenderJobDto): RenderConfig => ({
  anon: dto.anon ?? false,
  no_chat: dto.no_chat ?? false,
  no_logs: dto.no_logs ?? false,
  team_tracers: dto.team_tracers ?? false,
  fps: dto.fps ?? DEFAULT_FPS,
  quality: dto.quality ?? DEFAULT_QUALITY,
  discord_webhook_url: dto.discord_webhook_url ?? null,
});
