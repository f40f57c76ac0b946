import { HttpException, HttpStatus } from '@nestjs/common';
import { ExportError, QueryExecutionError, TranslationError } from './errors';

export type ErrorReply = { status: number; message: string };

/** Status and user-facing message for anything a query route can throw. */
export function toErrorReply(exception: unknown): ErrorReply {
  if (exception instanceof HttpException) {
    const res = exception.getResponse();
    const message =
      typeof res === 'object' && res !== null && 'message' in res
        ? res.message
        : exception.message;
    const msg = Array.isArray(message) ? message[0] : message;
    return {
      status: exception.getStatus(),
      message: typeof msg === 'string' ? msg : exception.message,
    };
  }
  if (exception instanceof TranslationError) {
    return { status: HttpStatus.BAD_GATEWAY, message: exception.message };
  }
  if (exception instanceof QueryExecutionError || exception instanceof ExportError) {
    return { status: HttpStatus.BAD_REQUEST, message: exception.message };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Something went wrong.' };
}
