import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { createReadStream } from 'fs';
import { ensureUuid } from '../../common/errors/ensure-uuid';
import { OwnerToken } from './decorators/owner-token.decorator';
import { CreateRenderJobDto, toRenderConfig } from './dto/create-render-job.dto';
import { MAX_UPLOAD_BYTES } from './render-jobs.constants';
import { RenderJobsService } from './render-jobs.service';
import { dispositionHeader, toJobView } from './render-jobs.view';

@Controller('api')
export class RenderJobsController {
  constructor(private readonly renderJobsService: RenderJobsService) {}

  @Post('jobs')
  @UseInterceptors(
    FileInterceptor('file', {
      limits: {
        files: 1,
        fileSize: MAX_UPLOAD_BYTES,
        fields: 20,
      },
    }),
  )
  async submit(
    @OwnerToken() ownerToken: string,
    @Body() body: CreateRenderJobDto,
    @UploadedFile() file?: Express.Multer.File,
  ) {
    if (!file?.buffer?.length) {
      throw new BadRequestException('Missing `file` upload');
    }

    const job = await this.renderJobsService.submit({
      file: {
        buffer: file.buffer,
        originalName: file.originalname,
      },
      ownerToken,
      config: toRenderConfig(body),
    });

    return {
      id: job.id,
      filename: job.originalFilename,
      status: job.status,
      message: 'Queued for rendering',
    };
  }

  @Get('jobs')
  async list(@OwnerToken() ownerToken: string) {
    const jobs = await this.renderJobsService.listForOwner(ownerToken);
    return jobs.map(toJobView);
  }

  @Get('jobs/:id')
  async get(@OwnerToken() ownerToken: string, @Param('id') id: string) {
    ensureUuid(id);
    const job = await this.renderJobsService.getStatus(id, { kind: 'owner', ownerToken });
    return toJobView(job);
  }

  @Get('jobs/:id/video')
  async video(
    @OwnerToken() ownerToken: string,
    @Param('id') id: string,
    @Query('download') download: string | undefined,
    @Res({ passthrough: true }) res: Response,
  ) {
    ensureUuid(id);
    const output = await this.renderJobsService.fetchOutput(id, { kind: 'owner', ownerToken });
    const disposition = download === '1' || download === 'true' ? 'attachment' : 'inline';

    res.setHeader('Content-Type', 'video/mp4');
    res.setHeader('Content-Disposition', dispositionHeader(output.downloadName, disposition));
    return new StreamableFile(createReadStream(output.path));
  }

  @Get('download-all')
  async downloadAll(
    @OwnerToken() ownerToken: string,
    @Res({ passthrough: true }) res: Response,
  ) {
    const { archive, filename } = await this.renderJobsService.downloadAllForOwner(ownerToken);

    res.setHeader('Content-Type', 'application/zip');
    res.setHeader('Content-Disposition', dispositionHeader(filename));
    return new StreamableFile(archive);
  }

  @Get('jobs/:id/metadata')
  async metadata(@OwnerToken() ownerToken: string, @Param('id') id: string) {
    ensureUuid(id);
    return this.renderJobsService.fetchMetadata(id, { kind: 'owner', ownerToken });
  }

  @Delete('jobs/:id')
  async remove(
    @OwnerToken() ownerToken: string,
    @Param('id') id: string,
    @Res() res: Response,
  ) {
    ensureUuid(id);
    const outcome = await this.renderJobsService.deleteJob(id, { kind: 'owner', ownerToken });
    // A job that is still rendering is removed by its worker once it finishes.
    res.status(outcome.deferred ? HttpStatus.ACCEPTED : HttpStatus.OK).json(outcome);
  }

  @Delete('jobs')
  async removeAll(@OwnerToken() ownerToken: string) {
    return this.renderJobsService.deleteAllForOwner(ownerToken);
  }

  @Get('retention')
  retention() {
    return this.renderJobsService.getRetentionPolicy();
  }
}
