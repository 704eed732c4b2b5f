import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import type { Response } from 'express';
import { RenderJobError } from './render-job.errors';
import { toHttpException } from './to-http-exception';

@Catch(RenderJobError)
export class RenderJobErrorFilter implements ExceptionFilter<RenderJobError> {
  catch(err: RenderJobError, host: ArgumentsHost) {
    const exception = toHttpException(err);
    const res = host.switchToHttp().getResponse<Response>();
    res.status(exception.getStatus()).json(exception.getResponse());
  }
}
