import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { OWNER_TOKEN_MAX_LENGTH } from '../render-jobs.constants';
import type { RenderConfig, RenderJobStatus } from '../render-jobs.types';

@Entity('render_jobs')
export class RenderJob {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'text' })
  originalFilename!: string;

  @Index()
  @Column({ type: 'varchar', length: OWNER_TOKEN_MAX_LENGTH })
  ownerToken!: string;

  @Column({ type: 'varchar', length: 16, default: 'queued' })
  status!: RenderJobStatus;

  @Column({ type: 'text', default: '' })
  message!: string;

  // Written once at submission; never updated afterwards.
  @Column({ type: 'simple-json', update: false })
  config!: RenderConfig;

  @Index()
  @Column({ type: Date, update: false })
  createdAt!: Date;

  @Column({ type: Date, nullable: true })
  completedAt!: Date | null;

  @Column({ type: 'text', nullable: true })
  outputPath!: string | null;
}
