import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { RenderJobError } from './render-job.errors';

export function toHttpException(err: RenderJobError): HttpException {
  const body = { error: err.code, message: err.message };

  switch (err.code) {
    case 'NOT_FOUND':
      return new NotFoundException(body);
    case 'ACCESS_DENIED':
      return new ForbiddenException(body);
    case 'JOB_NOT_READY':
      return new BadRequestException(body);
    case 'INVALID_TRANSITION':
      return new ConflictException(body);
    case 'STORE_ERROR':
      return new ServiceUnavailableException({
        error: err.code,
        message: 'Job storage is unavailable. Please try again later.',
      });
    case 'ARTIFACT_MISSING':
      return new InternalServerErrorException({
        error: err.code,
        message: 'Output file missing',
      });
    default:
      return new InternalServerErrorException({
        error: 'INTERNAL_ERROR',
        message: 'Something went wrong. Please try again later.',
      });
  }
}
