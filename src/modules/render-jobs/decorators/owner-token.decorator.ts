import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { Request, Response } from 'express';
import { OWNER_TOKEN_HEADER, OWNER_TOKEN_MAX_LENGTH } from '../render-jobs.constants';

const OWNER_TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Returns the header value when it is a usable session token, otherwise null. */
export const parseOwnerToken = (header: string | string[] | undefined) => {
  const value = (Array.isArray(header) ? header[0] : header)?.trim();
  if (!value || value.length > OWNER_TOKEN_MAX_LENGTH) return null;
  return OWNER_TOKEN_PATTERN.test(value) ? value : null;
};

/**
 * Resolves the caller's session token. A caller without a usable one is
 * issued a new token, echoed back in the same header so the client can keep it.
 */
export const OwnerToken = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const http = ctx.switchToHttp();
    const existing = parseOwnerToken(http.getRequest<Request>().headers[OWNER_TOKEN_HEADER]);
    if (existing) return existing;

    const issued = randomUUID();
    http.getResponse<Response>().setHeader(OWNER_TOKEN_HEADER, issued);
    return issued;
  },
);
