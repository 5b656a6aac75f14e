// src/attachments/attachment-exception.filter.ts
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { Error as MongooseError } from 'mongoose';

import {
  AttachmentError,
  FileNotFoundError,
  InvalidFileError,
  StorageIOError,
} from './errors';

type ErrorBody = { ok: false; error: string; reason?: string; fields?: Record<string, string> };

export function statusFor(err: AttachmentError): number {
  if (err instanceof FileNotFoundError) return HttpStatus.NOT_FOUND;
  if (err instanceof InvalidFileError) return HttpStatus.UNPROCESSABLE_ENTITY;
  if (err instanceof StorageIOError) return HttpStatus.SERVICE_UNAVAILABLE;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Attachment failures -> `{ ok: false, error }`.
 * Invalid files and record validation are 422, storage outages 503.
 */
@Catch(AttachmentError, MongooseError.ValidationError)
export class AttachmentExceptionFilter implements ExceptionFilter {
  private readonly log = new Logger(AttachmentExceptionFilter.name);

  catch(err: AttachmentError | MongooseError.ValidationError, host: ArgumentsHost) {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const [status, body] = this.describe(err);

    if (status >= 500) this.log.error(`[${body.error}] ${err.message}`, err.stack);
    else this.log.warn(`[${body.error}] ${err.message}`);

    return reply.status(status).send(body);
  }

  describe(err: AttachmentError | MongooseError.ValidationError): [number, ErrorBody] {
    if (err instanceof AttachmentError) {
      const body: ErrorBody = { ok: false, error: err.code };
      if (err instanceof InvalidFileError) body.reason = err.reason;
      return [statusFor(err), body];
    }

    const fields: Record<string, string> = {};
    for (const [path, detail] of Object.entries(err.errors)) fields[path] = detail.message;
    return [HttpStatus.UNPROCESSABLE_ENTITY, { ok: false, error: 'validation_failed', fields }];
  }
}
