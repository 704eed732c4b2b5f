import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import { basename, join, parse, resolve } from 'path';
import { ArtifactMissingError } from '../../common/errors/render-job.errors';
import {
  ensureDir,
  moveFile,
  pathExists,
  removeFile,
} from '../../common/utils/fs.utils';
import {
  renderJobsConfig,
  type RenderJobsConfigType,
} from '../../config/render-jobs.config';
import { parseParticipants } from './notifications/participants';
import { engineOutputCandidates } from './renderer/renderer.interface';
import type {
  Participant,
  PublishedOutputs,
  RenderCandidates,
} from './render-jobs.types';

export const safeFileName = (filename: string) => {
  const base = basename(filename.replace(/\\/g, '/')).trim();
  return base && base !== '.' && base !== '..' ? base : 'replay';
};

export const INPUT_EXTENSION = '.wowsreplay';

/**
 * Owns the on-disk layout of a job's files:
 * - input: `<uploadDir>/<id>_<stem>.wowsreplay` whatever the uploaded extension;
 *   never the path of an engine output
 * - outputs: `<outputDir>/<id>.mp4` and `<outputDir>/<id>.json`
 */
@Injectable()
export class ArtifactsService implements OnModuleInit {
  private readonly logger = new Logger(ArtifactsService.name);

  constructor(
    @Inject(renderJobsConfig.KEY)
    private readonly config: RenderJobsConfigType,
  ) {}

  onModuleInit() {
    ensureDir(this.config.uploadDir);
    ensureDir(this.config.outputDir);
  }

  locateInput(id: string, filename: string) {
    const { name } = parse(safeFileName(filename));
    return resolve(this.config.uploadDir, `${id}_${name}${INPUT_EXTENSION}`);
  }

  videoPath(id: string) {
    return join(this.config.outputDir, `${id}.mp4`);
  }

  metadataPath(id: string) {
    return join(this.config.outputDir, `${id}.json`);
  }

  async storeInput(id: string, filename: string, bytes: Buffer) {
    const path = this.locateInput(id, filename);
    ensureDir(this.config.uploadDir);
    // `wx`: an id is never reused, so an existing file means something is wrong.
    await fs.promises.writeFile(path, bytes, { flag: 'wx' });
    return path;
  }

  /**
   * Moves engine output from its working location next to the input into the
   * job-addressed output location. The video is required, the metadata is not.
   */
  async publishOutputs(id: string, candidates: RenderCandidates): Promise<PublishedOutputs> {
    if (!(await pathExists(candidates.videoPath))) {
      this.logger.warn(`Output file not found for job ${id}: ${candidates.videoPath}`);
      throw new ArtifactMissingError(id, candidates.videoPath);
    }

    const videoPath = this.videoPath(id);
    await moveFile(candidates.videoPath, videoPath);

    let metadataPath: string | null = null;
    if (await pathExists(candidates.metadataPath)) {
      metadataPath = this.metadataPath(id);
      await moveFile(candidates.metadataPath, metadataPath);
    }

    return { videoPath, metadataPath };
  }

  async readMetadata(id: string): Promise<Participant[] | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.metadataPath(id), 'utf8');
    } catch {
      return null;
    }

    try {
      return parseParticipants(JSON.parse(raw));
    } catch {
      this.logger.warn(`Metadata for job ${id} is not valid JSON`);
      return null;
    }
  }

  /** Removes every file a job may own. Safe to repeat. */
  async deleteAll(id: string, filename: string, outputPath?: string | null) {
    const inputPath = this.locateInput(id, filename);
    const leftovers = engineOutputCandidates(inputPath);
    const paths = new Set([
      inputPath,
      leftovers.videoPath,
      leftovers.metadataPath,
      this.videoPath(id),
      this.metadataPath(id),
    ]);
    if (outputPath) paths.add(outputPath);

    await Promise.all([...paths].map((path) => removeFile(path)));
  }
}
