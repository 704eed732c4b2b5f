import { BadRequestException } from '@nestjs/common';
import { isUUID } from 'class-validator';

export function ensureUuid(id: string) {
  if (!isUUID(id)) {
    throw new BadRequestException({
      error: 'INVALID_ID',
      message: 'Invalid id format.',
    });
  }
}
