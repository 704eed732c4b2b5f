import {
  Controller,
  Delete,
  Get,
  HttpStatus,
  Param,
  Post,
  Res,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import { createReadStream } from 'fs';
import { ensureUuid } from '../../common/errors/ensure-uuid';
import { AdminGuard } from './guards/admin.guard';
import { RenderJobsService } from './render-jobs.service';
import { toJobView } from './render-jobs.view';

const ADMIN = { kind: 'admin' } as const;

@Controller('admin')
@UseGuards(AdminGuard)
export class AdminRenderJobsController {
  constructor(private readonly renderJobsService: RenderJobsService) {}

  @Get('jobs')
  async listAll() {
    const jobs = await this.renderJobsService.listAll();
    return jobs.map(toJobView);
  }

  @Get('jobs/:id/video')
  async video(@Param('id') id: string, @Res({ passthrough: true }) res: Response) {
    ensureUuid(id);
    const output = await this.renderJobsService.fetchOutput(id, ADMIN);
    res.setHeader('Content-Type', 'video/mp4');
    return new StreamableFile(createReadStream(output.path));
  }

  @Get('jobs/:id/metadata')
  async metadata(@Param('id') id: string) {
    ensureUuid(id);
    return this.renderJobsService.fetchMetadata(id, ADMIN);
  }

  @Delete('jobs/:id')
  async remove(@Param('id') id: string, @Res() res: Response) {
    ensureUuid(id);
    const outcome = await this.renderJobsService.deleteJob(id, ADMIN);
    res.status(outcome.deferred ? HttpStatus.ACCEPTED : HttpStatus.OK).json(outcome);
  }

  @Delete('jobs')
  async removeAll() {
    return this.renderJobsService.deleteAll();
  }

  @Get('retention')
  retention() {
    return this.renderJobsService.getRetentionPolicy();
  }

  @Post('sweep')
  async sweep() {
    const deleted = await this.renderJobsService.sweepNow();
    return { deleted };
  }
}
