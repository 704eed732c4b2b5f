import { Injectable } from '@nestjs/common';
import { ArtifactsService } from './artifacts.service';
import type { RenderJob } from './entities/render-job.entity';
import { JobStoreService } from './job-store.service';

// Artifacts go first: an interrupted purge leaves a record that the next purge finishes.
@Injectable()
export class JobPurgerService {
  constructor(
    private readonly artifacts: ArtifactsService,
    private readonly store: JobStoreService,
  ) {}

  async purge(job: RenderJob) {
    await this.artifacts.deleteAll(job.id, job.originalFilename, job.outputPath);
    await this.store.delete(job.id);
  }
}
